import type { Logger } from "../utils/logger.js";

/**
 * How a labelled field is captured:
 * - `line`: rest of the line after `LABEL: `
 * - `digits`: one or more digits after `LABEL: `
 * - `fenced`: the body of a ``` fence on the lines after `LABEL:`; `lang` is the
 *   fence's info string ("" for an untagged fence)
 */
export type FieldCapture =
  | { kind: "line" }
  | { kind: "digits" }
  | { kind: "fenced"; lang: string };

export interface FieldSpec {
  label: string;
  capture: FieldCapture;
}

export interface BlockGrammar<T> {
  /** Used in diagnostics only. */
  name: string;
  fields: readonly FieldSpec[];
  /** Pattern that must follow the last field, e.g. a blank line or end of text. */
  terminator?: string;
  build(captures: readonly string[]): T;
}

const FENCE = "```";

export const line = (label: string): FieldSpec => ({ label, capture: { kind: "line" } });
export const digits = (label: string): FieldSpec => ({ label, capture: { kind: "digits" } });
export const fenced = (label: string, lang = ""): FieldSpec => ({
  label,
  capture: { kind: "fenced", lang },
});

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function fieldPattern({ label, capture }: FieldSpec): string {
  const name = escapeRegExp(label);
  switch (capture.kind) {
    case "line":
      return `${name}: (.+?)`;
    case "digits":
      return `${name}: (\\d+)`;
    case "fenced":
      return `${name}:\\n${FENCE}${escapeRegExp(capture.lang)}\\n([\\s\\S]+?)${FENCE}`;
  }
}

/** Fields are newline-separated, in order, each contributing exactly one capture group. */
export function compileGrammar(grammar: Pick<BlockGrammar<unknown>, "fields" | "terminator">): RegExp {
  const body = grammar.fields.map(fieldPattern).join("\\n");
  return new RegExp(body + (grammar.terminator ?? ""), "g");
}

/**
 * Finds every non-overlapping block matching `grammar`, left to right.
 * A match whose group count differs from `fields.length + 1`, or that lacks a
 * capture, is dropped; no partial record is built from it.
 */
export function extractBlocks<T>(text: string, grammar: BlockGrammar<T>, log: Logger): T[] {
  const pattern = compileGrammar(grammar);
  const expectedGroups = grammar.fields.length + 1;
  const records: T[] = [];

  for (const match of text.matchAll(pattern)) {
    if (match.length !== expectedGroups) {
      log.debug(
        { grammar: grammar.name, groups: match.length, expectedGroups, index: match.index },
        "Discarding block with unexpected group count"
      );
      continue;
    }

    const captures: string[] = [];
    for (const group of match.slice(1)) {
      if (typeof group === "string") captures.push(group);
    }
    if (captures.length !== grammar.fields.length) {
      log.debug({ grammar: grammar.name, index: match.index }, "Discarding block with missing capture");
      continue;
    }

    records.push(grammar.build(captures));
  }

  log.debug({ grammar: grammar.name, count: records.length }, "Extracted blocks");
  return records;
}
