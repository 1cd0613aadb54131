/**
 * Content element types
 *
 * Every structural unit found in a document is one variant of
 * ContentElement. Elements live in a flat array per document and point
 * at their parent by local id.
 */

/** Half-open character span into the raw document text */
export interface Position {
  start: number;
  end: number;
}

interface ElementBase<K extends string> {
  /** Local id, unique within one document (`<kind>-<ordinal>`) */
  id: string;
  kind: K;
  position: Position;
  /** Text covered by the element */
  content: string;
  /** Local id of the parent element */
  parentId: string | null;
}

export interface HeadingElement extends ElementBase<'heading'> {
  /** 1-6 */
  level: number;
  text: string;
}

export interface SectionElement extends ElementBase<'section'> {
  headingId: string;
}

export interface ListElement extends ElementBase<'list'> {
  ordered: boolean;
  /** 0 for a top-level list */
  level: number;
  itemCount: number;
}

export interface ListItemElement extends ElementBase<'list_item'> {
  text: string;
  ordered: boolean;
  level: number;
}

export interface TableCell {
  text: string;
  /** Row index; the header row is 0 */
  row: number;
  column: number;
  header: boolean;
}

export interface TableElement extends ElementBase<'table'> {
  headers: string[];
  rows: string[][];
  cells: TableCell[];
  /** Includes the header row */
  rowCount: number;
  columnCount: number;
}

export interface CodeBlockElement extends ElementBase<'code_block'> {
  language: string | null;
  code: string;
}

export interface BlockquoteElement extends ElementBase<'blockquote'> {
  /** Number of leading `>` markers */
  level: number;
}

export interface TodoItemElement extends ElementBase<'todo_item'> {
  text: string;
  checked: boolean;
}

export type TagSource = 'inline' | 'category' | 'frontmatter';

export interface TagElement extends ElementBase<'tag'> {
  name: string;
  category: string | null;
  source: TagSource;
}

export interface LinkElement extends ElementBase<'link'> {
  text: string;
  url: string;
  title: string | null;
  /** True when the URL has no scheme */
  internal: boolean;
  /** Definition key for reference-style links */
  referenceKey: string | null;
}

export interface ReferenceElement extends ElementBase<'reference'> {
  key: string;
  url: string;
  title: string | null;
}

export interface CitationElement extends ElementBase<'citation'> {
  text: string;
  /** Set for `[@key]` citations */
  key: string | null;
}

export interface WikiLinkElement extends ElementBase<'wikilink'> {
  targetPath: string;
  alias: string | null;
  /** Literal `[[...]]` text */
  originalText: string;
  resolvedDocumentUri: string | null;
}

/**
 * `position` spans the whole block including both `---` lines, while
 * `content` holds only the YAML between them
 */
export interface FrontmatterElement extends ElementBase<'frontmatter'> {
  format: 'yaml';
  data: Record<string, unknown>;
}

export type ContentElement =
  | HeadingElement
  | SectionElement
  | ListElement
  | ListItemElement
  | TableElement
  | CodeBlockElement
  | BlockquoteElement
  | TodoItemElement
  | TagElement
  | LinkElement
  | ReferenceElement
  | CitationElement
  | WikiLinkElement
  | FrontmatterElement;

export type ElementKind = ContentElement['kind'];

/** Narrow a ContentElement to one kind */
export type ElementOf<K extends ElementKind> = Extract<ContentElement, { kind: K }>;
