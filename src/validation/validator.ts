import { ValidationError, errorMessage } from "../errors.js";
import { collectPath, stringLeaves } from "../utils/json-path.js";
import { toJsonValue, type JsonValue } from "../utils/stable-json.js";
import { matchPlaceholder } from "./placeholders.js";
import type { ValidationPolicy } from "./policy.js";

export type ValidatedOutput = {
  policy: string;
  payload: JsonValue;
};

export type ValidationResult =
  | { ok: true; output: ValidatedOutput }
  | { ok: false; error: ValidationError };

type Parsed = { ok: true; value: unknown } | { ok: false; issue: string };

/**
 * Turn a capability's raw text into data. Models often wrap JSON in markdown
 * fences or surround it with prose, so fall back to the first {...} / [...] block.
 */
export function parseRawPayload(raw: unknown): Parsed {
  if (typeof raw !== "string") return { ok: true, value: raw };

  const stripped = raw
    .replace(/^\s*```(?:json)?\s*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();
  if (stripped === "") return { ok: false, issue: "payload is empty" };

  try {
    return { ok: true, value: JSON.parse(stripped) };
  } catch {
    const match = raw.match(/[{[][\s\S]*[}\]]/);
    if (match) {
      try {
        return { ok: true, value: JSON.parse(match[0]) };
      } catch {
        return { ok: false, issue: "payload contains malformed JSON" };
      }
    }
    return { ok: false, issue: "payload is not JSON" };
  }
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
}

function fail(policy: ValidationPolicy, issues: string[]): ValidationResult {
  return {
    ok: false,
    error: new ValidationError("VALIDATION_FAILED", `Output rejected by policy "${policy.name}": ${issues.join("; ")}`, issues),
  };
}

/**
 * Check a raw stage result against its policy. Pure: the verdict depends only
 * on the arguments.
 */
export function validate(raw: unknown, policy: ValidationPolicy): ValidationResult {
  const parsed = parseRawPayload(raw);
  if (!parsed.ok) return fail(policy, [parsed.issue]);

  const result = policy.schema.safeParse(parsed.value);
  if (!result.success) {
    return fail(
      policy,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  let payload: JsonValue;
  try {
    payload = toJsonValue(result.data);
  } catch (err) {
    return fail(policy, [`payload is not JSON data: ${errorMessage(err)}`]);
  }

  const issues: string[] = [];
  for (const field of policy.requiredFields) {
    const matches = collectPath(payload, field);
    if (matches.length === 0) issues.push(`${field}: required field is missing`);
    for (const m of matches) {
      if (m.value === undefined) issues.push(`${m.path}: required field is missing`);
      else if (isEmpty(m.value)) issues.push(`${m.path}: required field is empty`);
    }
  }

  const scanned = policy.placeholderFields
    ? policy.placeholderFields.flatMap((f) => collectPath(payload, f)).flatMap((m) => stringLeaves(m.value, m.path))
    : stringLeaves(payload);
  for (const leaf of scanned) {
    if (typeof leaf.value !== "string") continue;
    const pattern = matchPlaceholder(leaf.value, policy.placeholderPatterns);
    if (pattern) issues.push(`${leaf.path || "(root)"}: placeholder value "${leaf.value}" matches ${pattern}`);
  }

  if (issues.length > 0) return fail(policy, issues);
  return { ok: true, output: { policy: policy.name, payload } };
}
