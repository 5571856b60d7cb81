import type { PandocDocument } from "./pandoc-types.ts";
import { findFirstStr, walkDocument } from "./pandoc-walk.ts";

const NO_BREAK_SPACE = "\u00a0";

// Papers write `word\cite{key}` with no space before the parenthesized
// citation; pandoc keeps it glued to the preceding word.
export function addCitationSpacing(doc: PandocDocument): PandocDocument {
  return walkDocument(doc, {
    inline: (node) => {
      if (node.t !== "Cite") return undefined;
      const first = findFirstStr(node.c[1]);
      if (first !== undefined && first.c.startsWith("(")) {
        first.c = `${NO_BREAK_SPACE}${first.c}`;
      }
      return undefined;
    },
  });
}
