import type { Block, Header, PandocDocument } from "./pandoc-types.ts";
import { emptyAttr, identifierOf, str, walkDocument } from "./pandoc-walk.ts";

const BIBLIOGRAPHY_DIV_IDENTIFIER = "refs";

export function createReferencesHeading(): Header {
  return { t: "Header", c: [1, emptyAttr("references"), [str("References")]] };
}

export function addReferencesHeading(doc: PandocDocument): PandocDocument {
  return walkDocument(doc, {
    block: (node): Block[] | undefined => {
      if (node.t !== "Div" || identifierOf(node) !== BIBLIOGRAPHY_DIV_IDENTIFIER) {
        return undefined;
      }
      return [createReferencesHeading(), node];
    },
  });
}
