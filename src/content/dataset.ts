import { randomUUID } from "node:crypto";

import { DuplicateNameError, ValidationError } from "../errors.js";
import { combinedChecksum } from "./checksum.js";
import { fromSerialised, serializeDatafile } from "./datafile.js";
import { SerialisedDatasetSchema, type Datafile, type Dataset, type SerialisedDataset } from "./model.js";
import { hasTag, normaliseTags } from "./tags.js";

export interface BuildDatasetOptions {
  id?: string;
  tags?: string | Iterable<string>;
}

/**
 * Groups registered datafiles under a dataset name. Datafile names must be
 * unique inside a dataset; the order of `datafiles` carries no meaning.
 */
export function buildDataset(name: string, datafiles: Iterable<Datafile>, options: BuildDatasetOptions = {}): Dataset {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("dataset name must be a non-empty string", { strand: "dataset" });
  }

  const byName = new Map<string, Datafile>();
  for (const datafile of datafiles) {
    if (byName.has(datafile.name)) {
      throw new DuplicateNameError(trimmed, datafile.name);
    }
    byName.set(datafile.name, datafile);
  }

  return Object.freeze({
    id: options.id ?? randomUUID(),
    name: trimmed,
    tags: normaliseTags(options.tags),
    files: Object.freeze([...byName.values()]),
  });
}

/** The datafile called `name`, if the dataset holds one. */
export function getFileByName(dataset: Dataset, name: string): Datafile | undefined {
  return dataset.files.find((file) => file.name === name);
}

/**
 * Datafiles carrying `tag` exactly. The tag is validated first, so a malformed
 * one raises an `InvalidTagError` rather than matching nothing. See
 * `filterDatafiles` for attribute filters.
 */
export function filterFilesByTag(dataset: Dataset, tag: string): Datafile[] {
  return dataset.files.filter((file) => hasTag(file.tags, tag));
}

/** Order-independent digest of the dataset content. */
export function datasetChecksum(dataset: Dataset): string {
  return combinedChecksum(dataset.files);
}

/** Wire form of `dataset`, with datafiles in the dataset's order. */
export function serializeDataset(dataset: Dataset): SerialisedDataset {
  return {
    id: dataset.id,
    name: dataset.name,
    tags: [...dataset.tags],
    files: dataset.files.map(serializeDatafile),
  };
}

/**
 * Parses and validates the wire form of a dataset.
 *
 * @throws ValidationError when the document does not match the dataset schema.
 * @throws DuplicateNameError when two datafiles share a name.
 */
export function deserializeDataset(input: unknown): Dataset {
  const parsed = SerialisedDatasetSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("serialised dataset is invalid", {
      strand: "dataset",
      issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return fromSerialisedDataset(parsed.data);
}

/** Rebuilds a dataset from an already validated wire record. */
export function fromSerialisedDataset(record: SerialisedDataset): Dataset {
  return buildDataset(record.name, record.files.map(fromSerialised), { id: record.id, tags: record.tags });
}
