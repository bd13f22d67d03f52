import { Buffer } from "node:buffer";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, resolve as resolvePath } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

/**
 * Narrow storage capability consumed by the content model. Object stores are
 * external collaborators: the relay only needs to read, write and check
 * objects addressed by absolute URIs.
 */
export interface BlobStore {
  readBytes(uri: string): Promise<Buffer>;
  writeBytes(uri: string, bytes: Uint8Array): Promise<void>;
  exists(uri: string): Promise<boolean>;
  /** Returns `null` when the object does not exist. */
  describe(uri: string): Promise<BlobDescription | null>;
}

export interface BlobDescription {
  readonly size: number;
  readonly lastModified: number;
}

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

/** Returns the lower-cased scheme of an absolute URI, or `null` for plain paths. */
export function uriScheme(value: string): string | null {
  const match = SCHEME_PATTERN.exec(value);
  return match ? match[1].toLowerCase() : null;
}

export function isAbsoluteUri(value: string): boolean {
  return uriScheme(value) !== null;
}

/**
 * Converts a local path (relative or absolute) into a `file://` URI and leaves
 * URIs untouched, so nothing but absolute URIs ever leaves the process.
 */
export function toAbsoluteUri(pathOrUri: string): string {
  if (isAbsoluteUri(pathOrUri)) {
    return pathOrUri;
  }
  return pathToFileURL(resolvePath(pathOrUri)).href;
}

/** Last path segment of a URI, used as the default datafile name. */
export function uriBasename(uri: string): string {
  const withoutQuery = uri.split(/[?#]/, 1)[0];
  const segments = withoutQuery.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1] ?? "";
  return decodeURIComponent(last);
}

/** Map-backed store used by tests and single-process deployments. */
export class InMemoryBlobStore implements BlobStore {
  private readonly objects = new Map<string, { bytes: Buffer; lastModified: number }>();

  constructor(private readonly clock: () => number = () => Date.now()) {}

  async readBytes(uri: string): Promise<Buffer> {
    const entry = this.objects.get(uri);
    if (!entry) {
      throw new Error(`no object stored at '${uri}'`);
    }
    return Buffer.from(entry.bytes);
  }

  async writeBytes(uri: string, bytes: Uint8Array): Promise<void> {
    this.objects.set(uri, { bytes: Buffer.from(bytes), lastModified: this.clock() });
  }

  async exists(uri: string): Promise<boolean> {
    return this.objects.has(uri);
  }

  async describe(uri: string): Promise<BlobDescription | null> {
    const entry = this.objects.get(uri);
    return entry ? { size: entry.bytes.byteLength, lastModified: entry.lastModified } : null;
  }

  size(): number {
    return this.objects.size;
  }
}

/** Store resolving `file://` URIs on the local filesystem. */
export class FileBlobStore implements BlobStore {
  async readBytes(uri: string): Promise<Buffer> {
    return readFile(this.toPath(uri));
  }

  async writeBytes(uri: string, bytes: Uint8Array): Promise<void> {
    const path = this.toPath(uri);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
  }

  async exists(uri: string): Promise<boolean> {
    return (await this.describe(uri)) !== null;
  }

  async describe(uri: string): Promise<BlobDescription | null> {
    try {
      const stats = await stat(this.toPath(uri));
      return stats.isFile() ? { size: stats.size, lastModified: stats.mtimeMs } : null;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  private toPath(uri: string): string {
    if (uriScheme(uri) !== "file") {
      throw new Error(`FileBlobStore only handles file:// URIs, received '${uri}'`);
    }
    return fileURLToPath(uri);
  }
}

/**
 * Dispatches to a store per URI scheme, e.g. `file` to {@link FileBlobStore}
 * and `memory` to an {@link InMemoryBlobStore}.
 */
export class SchemeRoutingBlobStore implements BlobStore {
  private readonly routes: Map<string, BlobStore>;

  constructor(routes: Record<string, BlobStore>) {
    this.routes = new Map(Object.entries(routes).map(([scheme, store]) => [scheme.toLowerCase(), store]));
  }

  readBytes(uri: string): Promise<Buffer> {
    return this.route(uri).readBytes(uri);
  }

  writeBytes(uri: string, bytes: Uint8Array): Promise<void> {
    return this.route(uri).writeBytes(uri, bytes);
  }

  exists(uri: string): Promise<boolean> {
    return this.route(uri).exists(uri);
  }

  describe(uri: string): Promise<BlobDescription | null> {
    return this.route(uri).describe(uri);
  }

  private route(uri: string): BlobStore {
    const scheme = uriScheme(uri);
    const store = scheme ? this.routes.get(scheme) : undefined;
    if (!store) {
      throw new Error(`no blob store registered for '${uri}'`);
    }
    return store;
  }
}
