import { z } from "zod";
import { FragmentParseError, type FragmentKind } from "../utils/errors.js";

/**
 * A JSON value as the model produced it, before any field is trusted.
 * `other` covers booleans and null, which no dashboard field accepts.
 */
export type LooseValue =
  | { kind: "absent" }
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "list"; items: LooseValue[] }
  | { kind: "mapping"; fields: LooseMapping }
  | { kind: "other"; value: boolean | null };

export type LooseMapping = ReadonlyMap<string, LooseValue>;

export const ABSENT: LooseValue = { kind: "absent" };

export function toLooseValue(value: unknown): LooseValue {
  if (value === undefined) return ABSENT;
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "boolean" || value === null) return { kind: "other", value };
  if (Array.isArray(value)) return { kind: "list", items: value.map(toLooseValue) };
  if (typeof value === "object") return { kind: "mapping", fields: toLooseMapping(value) };
  return ABSENT;
}

function toLooseMapping(value: object): LooseMapping {
  const fields = new Map<string, LooseValue>();
  for (const [key, entry] of Object.entries(value)) {
    fields.set(key, toLooseValue(entry));
  }
  return fields;
}

export function field(mapping: LooseMapping, key: string): LooseValue {
  return mapping.get(key) ?? ABSENT;
}

export function stringField(mapping: LooseMapping, key: string): string | undefined {
  const value = field(mapping, key);
  return value.kind === "string" ? value.value : undefined;
}

export function describeKind(value: LooseValue): string {
  return value.kind === "other" ? (value.value === null ? "null" : "boolean") : value.kind;
}

/**
 * Integer view of a coordinate. Accepts numbers and numeric strings ("12",
 * "7.9", "4px" reads as 4); fractions truncate toward zero. Anything else,
 * including non-finite numbers, is `undefined`.
 */
export function coerceInteger(value: LooseValue): number | undefined {
  let n: number;
  switch (value.kind) {
    case "number":
      n = value.value;
      break;
    case "string":
      n = Number.parseFloat(value.value.trim());
      break;
    default:
      return undefined;
  }
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

const fragmentSchema = z.array(z.record(z.string(), z.unknown()));

/** Parses one fenced JSON body as an array of objects. */
export function parseFragment(kind: FragmentKind, raw: string): LooseMapping[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new FragmentParseError(kind, err instanceof Error ? err.message : String(err));
  }

  const result = fragmentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join(".")}]` : "";
    throw new FragmentParseError(kind, `${issue?.message ?? "invalid shape"}${where}`);
  }

  return result.data.map(toLooseMapping);
}
