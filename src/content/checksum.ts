import { createHash } from "node:crypto";

/** Algorithm used for datafile checksums. */
export const CHECKSUM_ALGORITHM = "sha256";

/** Hex digest of the given bytes. */
export function computeChecksum(data: Uint8Array | string): string {
  return createHash(CHECKSUM_ALGORITHM).update(data).digest("hex");
}

/**
 * Digest of a whole dataset, independent of file order: the per-file checksums
 * are sorted by datafile name, concatenated and hashed again.
 */
export function combinedChecksum(files: ReadonlyArray<{ name: string; checksum: string }>): string {
  const sorted = [...files].sort((a, b) => a.name.localeCompare(b.name));
  return computeChecksum(sorted.map((file) => file.checksum).join(""));
}
