import type {
  Attr,
  Block,
  Caption,
  Inline,
  MetaValue,
  PandocDocument,
  Row,
  Str,
} from "./pandoc-types.ts";

export type ParentNode = Block | Inline | undefined;

export type Replacement<T> = T | T[] | undefined;

/**
 * Callbacks run post-order: a node's children are walked before the node
 * itself is offered to the visitor. Returning `undefined` keeps the node,
 * a node replaces it, and an array splices its items in its place.
 * Replacement nodes are not walked again.
 */
export interface DocumentVisitor {
  inline?: (node: Inline, parent: ParentNode) => Replacement<Inline>;
  block?: (node: Block, parent: ParentNode) => Replacement<Block>;
}

export function emptyAttr(identifier = ""): Attr {
  return [identifier, [], []];
}

export function walkDocument(doc: PandocDocument, visitor: DocumentVisitor): PandocDocument {
  for (const [key, value] of Object.entries(doc.meta)) {
    doc.meta[key] = walkMetaValue(value, visitor);
  }
  doc.blocks = walkBlocks(doc.blocks, visitor, undefined);
  return doc;
}

export function walkBlocks(blocks: Block[], visitor: DocumentVisitor, parent: ParentNode): Block[] {
  const walked: Block[] = [];
  for (const block of blocks) {
    walkBlockChildren(block, visitor);
    appendBlocks(walked, block, visitor.block?.(block, parent));
  }
  return walked;
}

export function walkInlines(
  inlines: Inline[],
  visitor: DocumentVisitor,
  parent: ParentNode,
): Inline[] {
  const walked: Inline[] = [];
  for (const inline of inlines) {
    walkInlineChildren(inline, visitor);
    appendInlines(walked, inline, visitor.inline?.(inline, parent));
  }
  return walked;
}

export function identifierOf(node: ParentNode): string | undefined {
  return attrOf(node)?.[0];
}

export function attrOf(node: ParentNode): Attr | undefined {
  if (node === undefined) return undefined;
  switch (node.t) {
    case "Code":
    case "CodeBlock":
    case "Div":
    case "Figure":
    case "Image":
    case "Link":
    case "Span":
    case "Table":
      return node.c[0];
    case "Header":
      return node.c[1];
    default:
      return undefined;
  }
}

export function attributeValue(attr: Attr, key: string): string | undefined {
  return attr[2].find(([name]) => name === key)?.[1];
}

/** Depth-first search for the first `Str` below the given nodes. */
export function findFirstStr(nodes: ReadonlyArray<Block | Inline>): Str | undefined {
  for (const node of nodes) {
    if (node.t === "Str") return node;
    const found = findFirstStr(contentOf(node));
    if (found !== undefined) return found;
  }
  return undefined;
}

export function str(text: string): Str {
  return { t: "Str", c: text };
}

function contentOf(node: Block | Inline): Array<Block | Inline> {
  switch (node.t) {
    case "Emph":
    case "Underline":
    case "Strong":
    case "Strikeout":
    case "Superscript":
    case "Subscript":
    case "SmallCaps":
    case "Note":
    case "Plain":
    case "Para":
    case "BlockQuote":
      return node.c;
    case "Quoted":
    case "Cite":
    case "Link":
    case "Image":
    case "Span":
    case "Div":
      return node.c[1];
    case "LineBlock":
      return node.c.flat();
    case "BulletList":
      return node.c.flat();
    case "OrderedList":
      return node.c[1].flat();
    case "DefinitionList":
      return node.c.flatMap(([term, definitions]) => [...term, ...definitions.flat()]);
    case "Header":
    case "Figure":
      return node.c[2];
    default:
      return [];
  }
}

function walkInlineChildren(node: Inline, visitor: DocumentVisitor): void {
  switch (node.t) {
    case "Emph":
    case "Underline":
    case "Strong":
    case "Strikeout":
    case "Superscript":
    case "Subscript":
    case "SmallCaps":
      node.c = walkInlines(node.c, visitor, node);
      return;
    case "Quoted":
    case "Link":
    case "Image":
    case "Span":
      node.c[1] = walkInlines(node.c[1], visitor, node);
      return;
    case "Cite":
      for (const citation of node.c[0]) {
        citation.citationPrefix = walkInlines(citation.citationPrefix, visitor, node);
        citation.citationSuffix = walkInlines(citation.citationSuffix, visitor, node);
      }
      node.c[1] = walkInlines(node.c[1], visitor, node);
      return;
    case "Note":
      node.c = walkBlocks(node.c, visitor, node);
      return;
    default:
      return;
  }
}

function walkBlockChildren(node: Block, visitor: DocumentVisitor): void {
  switch (node.t) {
    case "Plain":
    case "Para":
      node.c = walkInlines(node.c, visitor, node);
      return;
    case "LineBlock":
      node.c = node.c.map((line) => walkInlines(line, visitor, node));
      return;
    case "BlockQuote":
      node.c = walkBlocks(node.c, visitor, node);
      return;
    case "OrderedList":
      node.c[1] = node.c[1].map((item) => walkBlocks(item, visitor, node));
      return;
    case "BulletList":
      node.c = node.c.map((item) => walkBlocks(item, visitor, node));
      return;
    case "DefinitionList":
      node.c = node.c.map(([term, definitions]): [Inline[], Block[][]] => [
        walkInlines(term, visitor, node),
        definitions.map((definition) => walkBlocks(definition, visitor, node)),
      ]);
      return;
    case "Header":
      node.c[2] = walkInlines(node.c[2], visitor, node);
      return;
    case "Table": {
      const [, caption, , head, bodies, foot] = node.c;
      node.c[1] = walkCaption(caption, visitor, node);
      head[1] = walkRows(head[1], visitor, node);
      for (const body of bodies) {
        body[2] = walkRows(body[2], visitor, node);
        body[3] = walkRows(body[3], visitor, node);
      }
      foot[1] = walkRows(foot[1], visitor, node);
      return;
    }
    case "Figure":
      node.c[1] = walkCaption(node.c[1], visitor, node);
      node.c[2] = walkBlocks(node.c[2], visitor, node);
      return;
    case "Div":
      node.c[1] = walkBlocks(node.c[1], visitor, node);
      return;
    default:
      return;
  }
}

function walkCaption(caption: Caption, visitor: DocumentVisitor, parent: Block): Caption {
  const [shortCaption, blocks] = caption;
  return [
    shortCaption === null ? null : walkInlines(shortCaption, visitor, parent),
    walkBlocks(blocks, visitor, parent),
  ];
}

function walkRows(rows: Row[], visitor: DocumentVisitor, parent: Block): Row[] {
  for (const [, cells] of rows) {
    for (const cell of cells) {
      cell[4] = walkBlocks(cell[4], visitor, parent);
    }
  }
  return rows;
}

function walkMetaValue(value: MetaValue, visitor: DocumentVisitor): MetaValue {
  switch (value.t) {
    case "MetaMap":
      for (const [key, entry] of Object.entries(value.c)) {
        value.c[key] = walkMetaValue(entry, visitor);
      }
      return value;
    case "MetaList":
      return { t: "MetaList", c: value.c.map((entry) => walkMetaValue(entry, visitor)) };
    case "MetaInlines":
      return { t: "MetaInlines", c: walkInlines(value.c, visitor, undefined) };
    case "MetaBlocks":
      return { t: "MetaBlocks", c: walkBlocks(value.c, visitor, undefined) };
    default:
      return value;
  }
}

function appendInlines(target: Inline[], original: Inline, replacement: Replacement<Inline>): void {
  if (replacement === undefined) {
    target.push(original);
  } else if (Array.isArray(replacement)) {
    target.push(...replacement);
  } else {
    target.push(replacement);
  }
}

function appendBlocks(target: Block[], original: Block, replacement: Replacement<Block>): void {
  if (replacement === undefined) {
    target.push(original);
  } else if (Array.isArray(replacement)) {
    target.push(...replacement);
  } else {
    target.push(replacement);
  }
}
