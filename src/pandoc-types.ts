/**
 * Pandoc JSON AST, API version 1.23 (pandoc 3.x). Every node carries a
 * `t` discriminator; nodes with content keep it in the `c` tuple.
 */

export type PandocApiVersion = number[];

export type AttrKeyValue = [key: string, value: string];

export type Attr = [identifier: string, classes: string[], attributes: AttrKeyValue[]];

export type Target = [url: string, title: string];

export type Format = string;

export interface Citation {
  citationId: string;
  citationPrefix: Inline[];
  citationSuffix: Inline[];
  citationMode: { t: "AuthorInText" | "SuppressAuthor" | "NormalCitation" };
  citationNoteNum: number;
  citationHash: number;
}

export interface Str {
  t: "Str";
  c: string;
}

export interface Space {
  t: "Space";
}

export interface SoftBreak {
  t: "SoftBreak";
}

export interface LineBreak {
  t: "LineBreak";
}

export interface Emph {
  t: "Emph";
  c: Inline[];
}

export interface Underline {
  t: "Underline";
  c: Inline[];
}

export interface Strong {
  t: "Strong";
  c: Inline[];
}

export interface Strikeout {
  t: "Strikeout";
  c: Inline[];
}

export interface Superscript {
  t: "Superscript";
  c: Inline[];
}

export interface Subscript {
  t: "Subscript";
  c: Inline[];
}

export interface SmallCaps {
  t: "SmallCaps";
  c: Inline[];
}

export interface Quoted {
  t: "Quoted";
  c: [quoteType: { t: "SingleQuote" | "DoubleQuote" }, inlines: Inline[]];
}

export interface Cite {
  t: "Cite";
  c: [citations: Citation[], inlines: Inline[]];
}

export interface Code {
  t: "Code";
  c: [attributes: Attr, text: string];
}

export interface MathInline {
  t: "Math";
  c: [mathType: { t: "DisplayMath" | "InlineMath" }, text: string];
}

export interface RawInline {
  t: "RawInline";
  c: [format: Format, text: string];
}

export interface Link {
  t: "Link";
  c: [attributes: Attr, inlines: Inline[], target: Target];
}

export interface Image {
  t: "Image";
  c: [attributes: Attr, altText: Inline[], target: Target];
}

export interface Note {
  t: "Note";
  c: Block[];
}

export interface Span {
  t: "Span";
  c: [attributes: Attr, inlines: Inline[]];
}

export type Inline =
  | Str
  | Space
  | SoftBreak
  | LineBreak
  | Emph
  | Underline
  | Strong
  | Strikeout
  | Superscript
  | Subscript
  | SmallCaps
  | Quoted
  | Cite
  | Code
  | MathInline
  | RawInline
  | Link
  | Image
  | Note
  | Span;

/** Short caption (or null) followed by the caption blocks. */
export type Caption = [shortCaption: Inline[] | null, blocks: Block[]];

export type Alignment = { t: "AlignLeft" | "AlignRight" | "AlignCenter" | "AlignDefault" };

export type ColWidth = { t: "ColWidth"; c: number } | { t: "ColWidthDefault" };

export type ColSpec = [alignment: Alignment, width: ColWidth];

export type Cell = [
  attributes: Attr,
  alignment: Alignment,
  rowSpan: number,
  colSpan: number,
  blocks: Block[],
];

export type Row = [attributes: Attr, cells: Cell[]];

export type TableHead = [attributes: Attr, rows: Row[]];

export type TableBody = [
  attributes: Attr,
  rowHeadColumns: number,
  headRows: Row[],
  bodyRows: Row[],
];

export type TableFoot = [attributes: Attr, rows: Row[]];

export type ListAttributes = [startNumber: number, style: { t: string }, delimiter: { t: string }];

export interface Plain {
  t: "Plain";
  c: Inline[];
}

export interface Para {
  t: "Para";
  c: Inline[];
}

export interface LineBlock {
  t: "LineBlock";
  c: Inline[][];
}

export interface CodeBlock {
  t: "CodeBlock";
  c: [attributes: Attr, text: string];
}

export interface RawBlock {
  t: "RawBlock";
  c: [format: Format, text: string];
}

export interface BlockQuote {
  t: "BlockQuote";
  c: Block[];
}

export interface OrderedList {
  t: "OrderedList";
  c: [listAttributes: ListAttributes, items: Block[][]];
}

export interface BulletList {
  t: "BulletList";
  c: Block[][];
}

export interface DefinitionList {
  t: "DefinitionList";
  c: Array<[term: Inline[], definitions: Block[][]]>;
}

export interface Header {
  t: "Header";
  c: [level: number, attributes: Attr, inlines: Inline[]];
}

export interface HorizontalRule {
  t: "HorizontalRule";
}

export interface Table {
  t: "Table";
  c: [
    attributes: Attr,
    caption: Caption,
    colSpecs: ColSpec[],
    head: TableHead,
    bodies: TableBody[],
    foot: TableFoot,
  ];
}

export interface Figure {
  t: "Figure";
  c: [attributes: Attr, caption: Caption, blocks: Block[]];
}

export interface Div {
  t: "Div";
  c: [attributes: Attr, blocks: Block[]];
}

export type Block =
  | Plain
  | Para
  | LineBlock
  | CodeBlock
  | RawBlock
  | BlockQuote
  | OrderedList
  | BulletList
  | DefinitionList
  | Header
  | HorizontalRule
  | Table
  | Figure
  | Div;

export type MetaValue =
  | { t: "MetaMap"; c: Record<string, MetaValue> }
  | { t: "MetaList"; c: MetaValue[] }
  | { t: "MetaBool"; c: boolean }
  | { t: "MetaString"; c: string }
  | { t: "MetaInlines"; c: Inline[] }
  | { t: "MetaBlocks"; c: Block[] };

export interface PandocDocument {
  "pandoc-api-version": PandocApiVersion;
  meta: Record<string, MetaValue>;
  blocks: Block[];
}
