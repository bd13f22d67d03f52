import { z, type ZodTypeAny } from "zod";

import { SerialisedManifestSchema } from "../content/model.js";
import { ValidationError } from "../errors.js";

/** Parts of a question/answer exchange validated against a service schema. */
export type Strand = "input_values" | "input_manifest" | "output_values" | "output_manifest";

/** Schema document consumed by the validator. */
export type DocumentSchema = ZodTypeAny;

/**
 * Schema advertised by a service. Each strand is optional; an absent strand
 * accepts any document. Manifest strands validate the serialised manifest.
 */
export interface ServiceSchema {
  readonly input_values?: DocumentSchema;
  readonly input_manifest?: DocumentSchema;
  readonly output_values?: DocumentSchema;
  readonly output_manifest?: DocumentSchema;
}

/**
 * Black-box validation capability. Implementations return the (possibly
 * normalised) document or throw {@link ValidationError}.
 */
export interface SchemaValidator {
  validate(document: unknown, schema: DocumentSchema, strand: Strand): unknown;
}

export const zodSchemaValidator: SchemaValidator = {
  validate(document, schema, strand) {
    const parsed = schema.safeParse(document);
    if (parsed.success) {
      return parsed.data;
    }
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    const summary = issues
      .slice(0, 3)
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`${strand} failed validation: ${summary}`, { strand, issues });
  },
};

/** Validates `document` against the strand of `schema`, when the strand is declared. */
export function validateStrand(
  validator: SchemaValidator,
  schema: ServiceSchema | undefined,
  strand: Strand,
  document: unknown,
): unknown {
  const strandSchema = schema?.[strand];
  if (!strandSchema) {
    return document;
  }
  return validator.validate(document, strandSchema, strand);
}

export interface DatasetRequirement {
  /** When true the dataset may be absent. */
  readonly optional?: boolean;
  readonly minFiles?: number;
  /** Tags the dataset itself must carry. */
  readonly requiredTags?: readonly string[];
  /** Allowed datafile extensions, without the dot. */
  readonly extensions?: readonly string[];
}

/**
 * Builds a manifest strand requiring the given dataset keys. The resulting
 * schema validates serialised manifests, so it runs unchanged on both sides
 * of the bus.
 */
export function manifestSchema(requirements: Readonly<Record<string, DatasetRequirement>>): DocumentSchema {
  return SerialisedManifestSchema.superRefine((manifest, ctx) => {
    for (const [key, requirement] of Object.entries(requirements)) {
      const dataset = manifest.datasets[key];
      if (!dataset) {
        if (!requirement.optional) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["datasets", key], message: "required dataset is missing" });
        }
        continue;
      }
      if (requirement.minFiles !== undefined && dataset.files.length < requirement.minFiles) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["datasets", key, "files"],
          message: `expected at least ${requirement.minFiles} file(s), found ${dataset.files.length}`,
        });
      }
      for (const tag of requirement.requiredTags ?? []) {
        if (!dataset.tags.includes(tag)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["datasets", key, "tags"],
            message: `missing required tag '${tag}'`,
          });
        }
      }
      if (requirement.extensions) {
        const allowed = new Set(requirement.extensions);
        dataset.files.forEach((file, index) => {
          if (!allowed.has(file.extension)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["datasets", key, "files", index, "extension"],
              message: `extension '${file.extension}' is not one of ${[...allowed].join(", ")}`,
            });
          }
        });
      }
    }
  });
}
