import { randomUUID } from "node:crypto";

import { DatasetNotFoundError, FileLocationError, ValidationError } from "../errors.js";
import type { BlobStore } from "../gateways/blobStore.js";
import { fromSerialisedDataset, serializeDataset } from "./dataset.js";
import { SerialisedManifestSchema, type Dataset, type Manifest, type SerialisedManifest } from "./model.js";

export interface BuildManifestOptions {
  id?: string;
  createdAt?: number;
}

const DATASET_KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;

/** Keys datasets by their logical role (`input`, `diagnostics`, ...). */
export function buildManifest(
  datasetsByKey: Readonly<Record<string, Dataset>>,
  options: BuildManifestOptions = {},
): Manifest {
  const datasets: Record<string, Dataset> = {};
  for (const [key, dataset] of Object.entries(datasetsByKey)) {
    if (!DATASET_KEY_PATTERN.test(key)) {
      throw new ValidationError(`dataset key '${key}' must match ${DATASET_KEY_PATTERN.source}`, {
        strand: "manifest",
      });
    }
    datasets[key] = dataset;
  }

  return Object.freeze({
    id: options.id ?? randomUUID(),
    createdAt: options.createdAt ?? Date.now(),
    datasets: Object.freeze(datasets),
  });
}

/** The dataset under `key`; raises `DatasetNotFoundError` listing the keys present. */
export function getDataset(manifest: Manifest, key: string): Dataset {
  const dataset = manifest.datasets[key];
  if (!dataset) {
    throw new DatasetNotFoundError(key, Object.keys(manifest.datasets));
  }
  return dataset;
}

/**
 * Confirms every datafile referenced by the manifest exists in storage. Run
 * before a manifest is sent so a child never receives dangling URIs.
 */
export async function verifyManifest(manifest: Manifest, store: BlobStore): Promise<void> {
  const missing: string[] = [];
  for (const dataset of Object.values(manifest.datasets)) {
    for (const file of dataset.files) {
      if (!(await store.exists(file.uri))) {
        missing.push(file.uri);
      }
    }
  }
  if (missing.length > 0) {
    throw new FileLocationError(missing);
  }
}

export function serializeManifest(manifest: Manifest): SerialisedManifest {
  const datasets: Record<string, ReturnType<typeof serializeDataset>> = {};
  for (const [key, dataset] of Object.entries(manifest.datasets)) {
    datasets[key] = serializeDataset(dataset);
  }
  return { id: manifest.id, created_at: Math.trunc(manifest.createdAt), datasets };
}

/** Parses and validates the wire form of a manifest, rebuilding every dataset. */
export function deserializeManifest(input: unknown): Manifest {
  const parsed = SerialisedManifestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("serialised manifest is invalid", {
      strand: "manifest",
      issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return fromSerialisedManifest(parsed.data);
}

export function fromSerialisedManifest(record: SerialisedManifest): Manifest {
  const datasets: Record<string, Dataset> = {};
  for (const [key, dataset] of Object.entries(record.datasets)) {
    datasets[key] = fromSerialisedDataset(dataset);
  }
  return buildManifest(datasets, { id: record.id, createdAt: record.created_at });
}
