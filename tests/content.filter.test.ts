import { describe, it } from "mocha";
import { expect } from "chai";

import { buildDataset } from "../src/content/dataset.js";
import {
  DATAFILE_ATTRIBUTES,
  filterDatafiles,
  filterDatasets,
  orderBy,
  satisfies,
} from "../src/content/filter.js";
import { buildManifest } from "../src/content/manifest.js";
import type { Datafile } from "../src/content/model.js";
import { InvalidFilterError } from "../src/errors.js";

function datafile(name: string, overrides: Partial<Datafile> = {}): Datafile {
  return {
    id: `id-${name}`,
    name,
    uri: `memory://bucket/${name}`,
    sizeBytes: 10,
    checksum: "0".repeat(64),
    lastModified: 1_000,
    extension: name.split(".").pop() ?? "",
    tags: [],
    metadata: {},
    cluster: 0,
    sequence: null,
    ...overrides,
  };
}

const readings = datafile("Readings.csv", { sizeBytes: 120, tags: ["raw", "site:north"], sequence: 0 });
const notes = datafile("notes.txt", { sizeBytes: 8, tags: ["calibrated"], cluster: 1 });
const extra = datafile("readings-extra.csv", { sizeBytes: 40, tags: ["raw"], sequence: 1 });
const dataset = buildDataset("measurements", [readings, notes, extra], { id: "ds-1", tags: "field" });

const names = (files: readonly Datafile[]): string[] => files.map((file) => file.name);

function failure(action: () => unknown): InvalidFilterError {
  try {
    action();
  } catch (error) {
    if (error instanceof InvalidFilterError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an InvalidFilterError");
}

describe("content filters", () => {
  it("matches string attributes", () => {
    expect(names(filterDatafiles(dataset, { name__icontains: "readings" }))).to.deep.equal([
      "Readings.csv",
      "readings-extra.csv",
    ]);
    expect(names(filterDatafiles(dataset, { name__contains: "readings" }))).to.deep.equal(["readings-extra.csv"]);
    expect(names(filterDatafiles(dataset, { name__not_contains: "e" }))).to.deep.equal([]);
    expect(names(filterDatafiles(dataset, { name__starts_with: "notes" }))).to.deep.equal(["notes.txt"]);
    expect(names(filterDatafiles(dataset, { extension__equals: "csv" }))).to.deep.equal([
      "Readings.csv",
      "readings-extra.csv",
    ]);
    expect(names(filterDatafiles(dataset, { name__ends_with: ".txt" }))).to.deep.equal(["notes.txt"]);
  });

  it("compares numbers and combines filters", () => {
    expect(names(filterDatafiles(dataset, { size_bytes__lt: 40 }))).to.deep.equal(["notes.txt"]);
    expect(names(filterDatafiles(dataset, { size_bytes__lte: 40 }))).to.deep.equal(["notes.txt", "readings-extra.csv"]);
    expect(names(filterDatafiles(dataset, { size_bytes__gt: 40 }))).to.deep.equal(["Readings.csv"]);
    expect(names(filterDatafiles(dataset, { size_bytes__gte: 40, extension__equals: "csv" }))).to.deep.equal([
      "Readings.csv",
      "readings-extra.csv",
    ]);
    expect(names(filterDatafiles(dataset, { cluster__equals: 1 }))).to.deep.equal(["notes.txt"]);
  });

  it("checks tag lists and absent values", () => {
    expect(names(filterDatafiles(dataset, { tags__contains: "raw" }))).to.deep.equal([
      "Readings.csv",
      "readings-extra.csv",
    ]);
    expect(names(filterDatafiles(dataset, { tags__not_contains: "raw" }))).to.deep.equal(["notes.txt"]);
    expect(names(filterDatafiles(dataset, { tags__starts_with: "site" }))).to.deep.equal(["Readings.csv"]);
    expect(names(filterDatafiles(dataset, { tags__equals: ["calibrated"] }))).to.deep.equal(["notes.txt"]);
    expect(satisfies(notes, DATAFILE_ATTRIBUTES, "sequence__is", null)).to.equal(true);
    expect(satisfies(readings, DATAFILE_ATTRIBUTES, "sequence__is_not", null)).to.equal(true);
  });

  it("keeps every datafile when no filter is given", () => {
    expect(names(filterDatafiles(dataset, {}))).to.deep.equal(["Readings.csv", "notes.txt", "readings-extra.csv"]);
  });

  it("orders the kept datafiles", () => {
    expect(names(filterDatafiles(dataset, { extension__equals: "csv" }, { orderBy: "size_bytes" }))).to.deep.equal([
      "readings-extra.csv",
      "Readings.csv",
    ]);
    expect(names(orderBy(dataset.files, DATAFILE_ATTRIBUTES, "tags", { reverse: true }))).to.deep.equal([
      "Readings.csv",
      "notes.txt",
      "readings-extra.csv",
    ]);
    expect(names(orderBy(dataset.files, DATAFILE_ATTRIBUTES, "sequence"))).to.deep.equal([
      "notes.txt",
      "Readings.csv",
      "readings-extra.csv",
    ]);
    expect(failure(() => orderBy(dataset.files, DATAFILE_ATTRIBUTES, "colour")).message).to.equal(
      "invalid filter 'colour': cannot order by unknown attribute 'colour'",
    );
  });

  it("filters the datasets of a manifest", () => {
    const empty = buildDataset("scratch", [], { id: "ds-2" });
    const manifest = buildManifest({ input: dataset, scratch: empty }, { id: "m-1", createdAt: 0 });

    expect(Object.keys(filterDatasets(manifest, { files__contains: "notes.txt" }))).to.deep.equal(["input"]);
    expect(Object.keys(filterDatasets(manifest, { tags__not_contains: "field" }))).to.deep.equal(["scratch"]);
    expect(Object.keys(filterDatasets(manifest, { name__icontains: "S" }))).to.deep.equal(["input", "scratch"]);
  });

  it("rejects malformed filter names and unknown attributes", () => {
    const malformed = failure(() => filterDatafiles(dataset, { name: "x" }));
    expect(malformed.kind).to.equal("InvalidFilterError");
    expect(malformed.message).to.equal("invalid filter 'name': filter names take the form '<attribute>__<action>'");

    const unknown = failure(() => filterDatafiles(dataset, { colour__equals: "red" }));
    expect(unknown.message).to.equal("invalid filter 'colour__equals': unknown attribute 'colour'");
    expect(unknown.filterName).to.equal("colour__equals");
  });

  it("rejects actions the attribute type does not support", () => {
    const unknownAction = failure(() => filterDatafiles(dataset, { name__resembles: "x" }));
    expect(unknownAction.message).to.equal("invalid filter 'name__resembles': unknown action 'resembles'");

    const mismatched = failure(() => filterDatafiles(dataset, { name__lt: 3 }));
    expect(mismatched.message).to.equal("invalid filter 'name__lt': no action 'lt' for string attributes");
    expect(mismatched.details?.supported).to.deep.equal([
      "icontains",
      "contains",
      "not_contains",
      "starts_with",
      "ends_with",
      "equals",
      "is",
      "is_not",
    ]);

    const wrongValue = failure(() => filterDatafiles(dataset, { size_bytes__gt: "10" }));
    expect(wrongValue.message).to.equal("invalid filter 'size_bytes__gt': expects a number value");
  });
});
