import { InvalidFilterError } from "../errors.js";
import type { Datafile, Dataset, Manifest } from "./model.js";

/** Attribute values the filters understand. */
export type AttributeValue = string | number | boolean | null | readonly string[];

/** Named accessors exposing the filterable attributes of `T`. */
export type AttributeReaders<T> = ReadonlyMap<string, (item: T) => AttributeValue>;

/**
 * Filters keyed `<attribute>__<action>`, e.g. `{ name__starts_with: "raw",
 * size_bytes__gt: 1024 }`. Every entry must hold for an item to be kept.
 */
export type FilterSpec = Readonly<Record<string, unknown>>;

type Predicate<V> = (attribute: V, expected: unknown, filterName: string) => boolean;
type ActionTable<V> = ReadonlyMap<string, Predicate<V>>;

function textValue(expected: unknown, filterName: string): string {
  if (typeof expected !== "string") {
    throw new InvalidFilterError(filterName, "expects a string value");
  }
  return expected;
}

function numberValue(expected: unknown, filterName: string): number {
  if (typeof expected !== "number" || Number.isNaN(expected)) {
    throw new InvalidFilterError(filterName, "expects a number value");
  }
  return expected;
}

const IS_ACTIONS: Array<[string, Predicate<AttributeValue>]> = [
  ["is", (attribute, expected) => attribute === expected],
  ["is_not", (attribute, expected) => attribute !== expected],
];

const BOOLEAN_ACTIONS: ActionTable<boolean> = new Map(IS_ACTIONS);

const NULL_ACTIONS: ActionTable<null> = new Map(IS_ACTIONS);

const STRING_ACTIONS: ActionTable<string> = new Map<string, Predicate<string>>([
  ["icontains", (attribute, expected, name) => attribute.toLowerCase().includes(textValue(expected, name).toLowerCase())],
  ["contains", (attribute, expected, name) => attribute.includes(textValue(expected, name))],
  ["not_contains", (attribute, expected, name) => !attribute.includes(textValue(expected, name))],
  ["starts_with", (attribute, expected, name) => attribute.startsWith(textValue(expected, name))],
  ["ends_with", (attribute, expected, name) => attribute.endsWith(textValue(expected, name))],
  ["equals", (attribute, expected) => attribute === expected],
  ...IS_ACTIONS,
]);

const NUMBER_ACTIONS: ActionTable<number> = new Map<string, Predicate<number>>([
  ["lt", (attribute, expected, name) => attribute < numberValue(expected, name)],
  ["lte", (attribute, expected, name) => attribute <= numberValue(expected, name)],
  ["gt", (attribute, expected, name) => attribute > numberValue(expected, name)],
  ["gte", (attribute, expected, name) => attribute >= numberValue(expected, name)],
  ["equals", (attribute, expected) => attribute === expected],
  ...IS_ACTIONS,
]);

// Tag lists: `starts_with` and `ends_with` hold when any entry matches.
const LIST_ACTIONS: ActionTable<readonly string[]> = new Map<string, Predicate<readonly string[]>>([
  ["contains", (attribute, expected) => attribute.some((entry) => entry === expected)],
  ["not_contains", (attribute, expected) => !attribute.some((entry) => entry === expected)],
  [
    "starts_with",
    (attribute, expected, name) => {
      const prefix = textValue(expected, name);
      return attribute.some((entry) => entry.startsWith(prefix));
    },
  ],
  [
    "ends_with",
    (attribute, expected, name) => {
      const suffix = textValue(expected, name);
      return attribute.some((entry) => entry.endsWith(suffix));
    },
  ],
  [
    "equals",
    (attribute, expected) =>
      Array.isArray(expected) &&
      expected.length === attribute.length &&
      attribute.every((entry, index) => entry === expected[index]),
  ],
  ...IS_ACTIONS,
]);

const KNOWN_ACTIONS: ReadonlySet<string> = new Set(
  [BOOLEAN_ACTIONS, NULL_ACTIONS, STRING_ACTIONS, NUMBER_ACTIONS, LIST_ACTIONS].flatMap((table) => [...table.keys()]),
);

function runAction<V>(
  table: ActionTable<V>,
  typeName: string,
  attribute: V,
  action: string,
  expected: unknown,
  filterName: string,
): boolean {
  const predicate = table.get(action);
  if (!predicate) {
    throw new InvalidFilterError(filterName, `no action '${action}' for ${typeName} attributes`, [...table.keys()]);
  }
  return predicate(attribute, expected, filterName);
}

function evaluate(attribute: AttributeValue, action: string, expected: unknown, filterName: string): boolean {
  if (attribute === null) {
    return runAction(NULL_ACTIONS, "null", attribute, action, expected, filterName);
  }
  if (typeof attribute === "string") {
    return runAction(STRING_ACTIONS, "string", attribute, action, expected, filterName);
  }
  if (typeof attribute === "number") {
    return runAction(NUMBER_ACTIONS, "number", attribute, action, expected, filterName);
  }
  if (typeof attribute === "boolean") {
    return runAction(BOOLEAN_ACTIONS, "boolean", attribute, action, expected, filterName);
  }
  return runAction(LIST_ACTIONS, "list", attribute, action, expected, filterName);
}

interface CompiledFilter<T> {
  readonly name: string;
  readonly read: (item: T) => AttributeValue;
  readonly action: string;
  readonly expected: unknown;
}

function compile<T>(readers: AttributeReaders<T>, filterName: string, expected: unknown): CompiledFilter<T> {
  const separator = filterName.indexOf("__");
  if (separator <= 0 || separator + 2 >= filterName.length) {
    throw new InvalidFilterError(filterName, "filter names take the form '<attribute>__<action>'");
  }
  const attribute = filterName.slice(0, separator);
  const action = filterName.slice(separator + 2);
  const read = readers.get(attribute);
  if (!read) {
    throw new InvalidFilterError(filterName, `unknown attribute '${attribute}'`, [...readers.keys()]);
  }
  if (!KNOWN_ACTIONS.has(action)) {
    throw new InvalidFilterError(filterName, `unknown action '${action}'`, [...KNOWN_ACTIONS]);
  }
  return { name: filterName, read, action, expected };
}

/** Whether `item` passes the single filter `filterName`. */
export function satisfies<T>(item: T, readers: AttributeReaders<T>, filterName: string, expected: unknown): boolean {
  const filter = compile(readers, filterName, expected);
  return evaluate(filter.read(item), filter.action, filter.expected, filter.name);
}

/**
 * Keeps the items passing every filter, in their original order. Filter names
 * and attributes are checked before any item is looked at; an action the
 * attribute's type lacks fails on the first item carrying that type.
 */
export function applyFilters<T>(items: Iterable<T>, readers: AttributeReaders<T>, filters: FilterSpec): T[] {
  const compiled = Object.entries(filters).map(([name, expected]) => compile(readers, name, expected));
  const kept: T[] = [];
  for (const item of items) {
    if (compiled.every((filter) => evaluate(filter.read(item), filter.action, filter.expected, filter.name))) {
      kept.push(item);
    }
  }
  return kept;
}

function sortKey(value: AttributeValue): number | string {
  if (value === null) {
    return Number.NEGATIVE_INFINITY;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  return value.length;
}

function compareKeys(left: number | string, right: number | string): number {
  if (typeof left === "number" && typeof right === "number") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  // Numbers sort before strings.
  return typeof left === "number" ? -1 : 1;
}

/**
 * Sorts a copy of `items` by one attribute. Lists order by their length and
 * `null` sorts first; the sort is stable.
 */
export function orderBy<T>(
  items: Iterable<T>,
  readers: AttributeReaders<T>,
  attribute: string,
  options: { reverse?: boolean } = {},
): T[] {
  const read = readers.get(attribute);
  if (!read) {
    throw new InvalidFilterError(attribute, `cannot order by unknown attribute '${attribute}'`, [...readers.keys()]);
  }
  const direction = options.reverse ? -1 : 1;
  return [...items]
    .map((item) => ({ item, key: sortKey(read(item)) }))
    .sort((left, right) => direction * compareKeys(left.key, right.key))
    .map((entry) => entry.item);
}

/** Filterable attributes of a datafile, named as on the wire. */
export const DATAFILE_ATTRIBUTES: AttributeReaders<Datafile> = new Map<string, (file: Datafile) => AttributeValue>([
  ["id", (file) => file.id],
  ["name", (file) => file.name],
  ["uri", (file) => file.uri],
  ["size_bytes", (file) => file.sizeBytes],
  ["checksum", (file) => file.checksum],
  ["last_modified", (file) => file.lastModified],
  ["extension", (file) => file.extension],
  ["tags", (file) => file.tags],
  ["cluster", (file) => file.cluster],
  ["sequence", (file) => file.sequence],
]);

/** Filterable attributes of a dataset; `files` lists the datafile names. */
export const DATASET_ATTRIBUTES: AttributeReaders<Dataset> = new Map<string, (dataset: Dataset) => AttributeValue>([
  ["id", (dataset) => dataset.id],
  ["name", (dataset) => dataset.name],
  ["tags", (dataset) => dataset.tags],
  ["files", (dataset) => dataset.files.map((file) => file.name)],
]);

export interface FilterOptions {
  /** Attribute to sort the kept items by. */
  orderBy?: string;
  reverse?: boolean;
}

/** Datafiles of `dataset` passing every filter. */
export function filterDatafiles(dataset: Dataset, filters: FilterSpec, options: FilterOptions = {}): Datafile[] {
  const kept = applyFilters(dataset.files, DATAFILE_ATTRIBUTES, filters);
  return options.orderBy === undefined ? kept : orderBy(kept, DATAFILE_ATTRIBUTES, options.orderBy, options);
}

/** Datasets of `manifest` passing every filter, keyed as in the manifest. */
export function filterDatasets(manifest: Manifest, filters: FilterSpec): Record<string, Dataset> {
  const entries = Object.entries(manifest.datasets);
  const kept = new Set(applyFilters(entries.map(([, dataset]) => dataset), DATASET_ATTRIBUTES, filters));
  const result: Record<string, Dataset> = {};
  for (const [key, dataset] of entries) {
    if (kept.has(dataset)) {
      result[key] = dataset;
    }
  }
  return result;
}
