import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { assertReadableFile } from "./file-access.ts";
import type { Inline, PandocDocument, Span } from "./pandoc-types.ts";
import { attributeValue, emptyAttr, str, walkDocument } from "./pandoc-walk.ts";

const ACRONYM_DEFINITION_PATTERN =
  /^\\newacronym(\[.*\])?\{(?<label>[A-Za-z]+)\}\{.+\}\{(?<value>[A-Za-z 0-9-]+)\}/u;
const ACRONYM_LABEL_ATTRIBUTE = "acronym-label";
const ACRONYM_FORM_ATTRIBUTE = "acronym-form";

export interface AcronymState {
  /** Label to long form, read-only once loaded. */
  definitions: ReadonlyMap<string, string>;
  /** Labels already introduced through a `short` use. */
  introduced: Set<string>;
  reportedUnknown: Set<string>;
  warn: (message: string) => void;
}

export function createAcronymState(
  definitions: ReadonlyMap<string, string>,
  warn: (message: string) => void = (message) => console.error(message),
): AcronymState {
  return { definitions, introduced: new Set(), reportedUnknown: new Set(), warn };
}

export function parseAcronymDefinitions(text: string): Map<string, string> {
  const definitions = new Map<string, string>();
  for (const line of text.split(/\r?\n/u)) {
    const match = ACRONYM_DEFINITION_PATTERN.exec(line);
    const label = match?.groups?.label;
    const value = match?.groups?.value;
    if (label === undefined || value === undefined) continue;
    definitions.set(label, value);
  }
  return definitions;
}

export async function loadAcronyms(acronymsPath: string): Promise<Map<string, string>> {
  const resolvedAcronymsPath = resolve(acronymsPath);
  await assertReadableFile(resolvedAcronymsPath, "acronym definitions");
  return parseAcronymDefinitions(await readFile(resolvedAcronymsPath, "utf8"));
}

export function resolveAcronyms(doc: PandocDocument, state: AcronymState): PandocDocument {
  return walkDocument(doc, {
    inline: (node) => (node.t === "Span" ? resolveAcronymSpan(node, state) : undefined),
  });
}

export function resolveAcronymSpan(span: Span, state: AcronymState): Inline | undefined {
  const attr = span.c[0];
  const label = attributeValue(attr, ACRONYM_LABEL_ATTRIBUTE);
  if (label === undefined) return undefined;

  const longForm = state.definitions.get(label);
  if (longForm === undefined) {
    if (!state.reportedUnknown.has(label)) {
      state.reportedUnknown.add(label);
      state.warn(`Unknown acronym: ${label}`);
    }
    return undefined;
  }

  const form = attributeValue(attr, ACRONYM_FORM_ATTRIBUTE) ?? "";
  return { t: "Span", c: [emptyAttr(), [str(renderAcronym(label, longForm, form, state))]] };
}

export function renderAcronym(
  label: string,
  longForm: string,
  form: string,
  state: Pick<AcronymState, "introduced">,
): string {
  const singular = form.includes("singular");
  const isShort = form.includes("short");

  if (state.introduced.has(label) && isShort) {
    return singular ? label : `${label}s`;
  }

  if (form.includes("full") || isShort) {
    if (isShort) state.introduced.add(label);
    return singular ? `${longForm} (${label})` : `${longForm}s (${label}s)`;
  }

  if (form.includes("abbrv")) {
    return singular ? label : `${label}s`;
  }

  return longForm;
}
