import { randomUUID } from "node:crypto";
import { extname } from "node:path";

import { ChecksumMismatchError, ValidationError } from "../errors.js";
import { FileBlobStore, toAbsoluteUri, uriBasename, type BlobStore } from "../gateways/blobStore.js";
import { computeChecksum } from "./checksum.js";
import { SerialisedDatafileSchema, type Datafile, type SerialisedDatafile } from "./model.js";
import { normaliseTags } from "./tags.js";

export interface RegisterDatafileOptions {
  /** Storage capability used to read the bytes; defaults to the local filesystem. */
  store?: BlobStore;
  /** Pre-declared checksum; registration fails when the content disagrees. */
  checksum?: string;
  name?: string;
  id?: string;
  tags?: string | Iterable<string>;
  metadata?: Record<string, unknown>;
  /** Overrides the last-modified timestamp reported by the store. */
  lastModified?: number;
  cluster?: number;
  sequence?: number | null;
}

const defaultStore = new FileBlobStore();

/**
 * Registers the file at `pathOrUri`: the content is read once, its checksum
 * and size computed, and a frozen {@link Datafile} returned. Local paths are
 * converted to `file://` URIs.
 */
export async function register(pathOrUri: string, options: RegisterDatafileOptions = {}): Promise<Datafile> {
  const store = options.store ?? defaultStore;
  const uri = toAbsoluteUri(pathOrUri);
  const bytes = await store.readBytes(uri);
  const checksum = computeChecksum(bytes);

  if (options.checksum !== undefined && options.checksum.toLowerCase() !== checksum) {
    throw new ChecksumMismatchError(uri, options.checksum, checksum);
  }

  const description = options.lastModified === undefined ? await store.describe(uri) : null;
  const name = options.name ?? uriBasename(uri);
  if (name.length === 0) {
    throw new ValidationError(`cannot derive a datafile name from '${uri}'`, { strand: "datafile" });
  }

  return freezeDatafile({
    id: options.id ?? randomUUID(),
    name,
    uri,
    sizeBytes: bytes.byteLength,
    checksum,
    lastModified: options.lastModified ?? description?.lastModified ?? Date.now(),
    extension: extname(name).replace(/^\./, ""),
    tags: normaliseTags(options.tags),
    metadata: { ...(options.metadata ?? {}) },
    cluster: options.cluster ?? 0,
    sequence: options.sequence ?? null,
  });
}

/**
 * Re-reads the content and confirms it still matches the registered checksum.
 */
export async function verifyDatafile(datafile: Datafile, store: BlobStore = defaultStore): Promise<void> {
  const actual = computeChecksum(await store.readBytes(datafile.uri));
  if (actual !== datafile.checksum) {
    throw new ChecksumMismatchError(datafile.uri, datafile.checksum, actual);
  }
}

export function serializeDatafile(datafile: Datafile): SerialisedDatafile {
  return {
    id: datafile.id,
    name: datafile.name,
    uri: datafile.uri,
    size_bytes: datafile.sizeBytes,
    checksum: datafile.checksum,
    last_modified: Math.trunc(datafile.lastModified),
    extension: datafile.extension,
    tags: [...datafile.tags],
    metadata: { ...datafile.metadata },
    cluster: datafile.cluster,
    sequence: datafile.sequence,
  };
}

/**
 * Parses the wire form of a datafile. The content is not re-read; call
 * {@link verifyDatafile} to check it against storage.
 */
export function deserializeDatafile(input: unknown): Datafile {
  const parsed = SerialisedDatafileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("serialised datafile is invalid", {
      strand: "datafile",
      issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return fromSerialised(parsed.data);
}

/** Builds a datafile from an already-validated wire record. */
export function fromSerialised(record: SerialisedDatafile): Datafile {
  return freezeDatafile({
    id: record.id,
    name: record.name,
    uri: record.uri,
    sizeBytes: record.size_bytes,
    checksum: record.checksum,
    lastModified: record.last_modified,
    extension: record.extension,
    tags: normaliseTags(record.tags),
    metadata: { ...record.metadata },
    cluster: record.cluster,
    sequence: record.sequence,
  });
}

function freezeDatafile(datafile: Datafile): Datafile {
  Object.freeze(datafile.metadata);
  return Object.freeze(datafile);
}
