import { z } from "zod";

import { isAbsoluteUri } from "../gateways/blobStore.js";

/** A registered file: an absolute URI plus the integrity metadata captured at registration. */
export interface Datafile {
  readonly id: string;
  readonly name: string;
  readonly uri: string;
  readonly sizeBytes: number;
  /** Hex SHA-256 digest of the content bytes. */
  readonly checksum: string;
  /** Epoch milliseconds. */
  readonly lastModified: number;
  readonly extension: string;
  readonly tags: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
  /** Group of related files within a dataset. */
  readonly cluster: number;
  /** Position of the file inside its cluster, when files form a sequence. */
  readonly sequence: number | null;
}

/** Named group of datafiles, tagged as a whole. */
export interface Dataset {
  readonly id: string;
  readonly name: string;
  readonly tags: readonly string[];
  readonly files: readonly Datafile[];
}

/** Datasets keyed by the role they play in an analysis, e.g. `input`. */
export interface Manifest {
  readonly id: string;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly datasets: Readonly<Record<string, Dataset>>;
}

const AbsoluteUriSchema = z
  .string()
  .min(1)
  .refine((value) => isAbsoluteUri(value), { message: "must be an absolute URI" });

const TagListSchema = z.array(z.string().min(1)).max(256);

/** Wire form of a {@link Datafile}. */
export const SerialisedDatafileSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    uri: AbsoluteUriSchema,
    size_bytes: z.number().int().nonnegative(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/, "checksum must be a hex SHA-256 digest"),
    last_modified: z.number().int().nonnegative(),
    extension: z.string(),
    tags: TagListSchema,
    metadata: z.record(z.unknown()),
    cluster: z.number().int().nonnegative(),
    sequence: z.number().int().nonnegative().nullable(),
  })
  .strict();

export const SerialisedDatasetSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    tags: TagListSchema,
    files: z.array(SerialisedDatafileSchema),
  })
  .strict();

export const SerialisedManifestSchema = z
  .object({
    id: z.string().min(1),
    created_at: z.number().int().nonnegative(),
    datasets: z.record(SerialisedDatasetSchema),
  })
  .strict();

export type SerialisedDatafile = z.infer<typeof SerialisedDatafileSchema>;
export type SerialisedDataset = z.infer<typeof SerialisedDatasetSchema>;
export type SerialisedManifest = z.infer<typeof SerialisedManifestSchema>;
