import type { PandocDocument } from "./pandoc-types.ts";
import { walkDocument } from "./pandoc-walk.ts";

// pandoc renders \SIRange{1}{2}{\milli\second} as "1 ms–2 ms" with no-break
// spaces. Both halves must carry the same unit; anything else, such as a
// page locator "pp. 12–15", is left alone.
const SI_RANGE_PATTERN = /^([^\u00a0\u2013]+)\u00a0([^\u00a0\u2013]+)\u2013([^\u00a0\u2013]+)\u00a0\2$/u;

export function formatSiRange(text: string): string {
  const match = SI_RANGE_PATTERN.exec(text);
  if (!match) return text;
  return `${match[1]}\u2013${match[3]} ${match[2]}`;
}

export function fixSiRanges(doc: PandocDocument): PandocDocument {
  return walkDocument(doc, {
    inline: (node) => {
      if (node.t === "Str") node.c = formatSiRange(node.c);
      return undefined;
    },
  });
}
