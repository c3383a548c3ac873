import type { z } from "zod";
import { DEFAULT_PLACEHOLDER_PATTERNS } from "./placeholders.js";

/**
 * What a stage's output must look like. The schema checks structure; the
 * content rules catch payloads that are well-formed but empty or templated.
 */
export type ValidationPolicy = {
  name: string;
  schema: z.ZodTypeAny;
  /** Dot paths (with `*` for every array element) that must be present and non-empty. */
  requiredFields: readonly string[];
  placeholderPatterns: readonly RegExp[];
  /** Paths whose strings are scanned for placeholders. Default: every string in the payload. */
  placeholderFields?: readonly string[];
};

export type PolicyOptions = {
  name: string;
  schema: z.ZodTypeAny;
  requiredFields?: string[];
  placeholderPatterns?: RegExp[];
  placeholderFields?: string[];
};

export function definePolicy(opts: PolicyOptions): ValidationPolicy {
  for (const pattern of opts.placeholderPatterns ?? []) {
    if (pattern.global || pattern.sticky) {
      throw new TypeError(`Placeholder pattern ${pattern} must not be global or sticky`);
    }
  }
  return Object.freeze({
    name: opts.name,
    schema: opts.schema,
    requiredFields: Object.freeze([...(opts.requiredFields ?? [])]),
    placeholderPatterns: opts.placeholderPatterns
      ? Object.freeze([...opts.placeholderPatterns])
      : DEFAULT_PLACEHOLDER_PATTERNS,
    placeholderFields: opts.placeholderFields ? Object.freeze([...opts.placeholderFields]) : undefined,
  });
}
