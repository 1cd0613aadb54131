/**
 * Entity types
 *
 * The exported, globally addressable layer. Relationships between
 * entities are URI strings, never object references.
 */

import type { FrontmatterMetadata } from './document.js';
import type { TagSource } from './elements.js';

interface EntityBase<T extends string> {
  type: T;
  /** Global URI */
  id: string;
  createdAt: Date;
  updatedAt: Date;
  label?: string;
  /** URI of the owning document */
  sourceDocumentUri?: string;
  /** Character span in the source text */
  span?: [number, number];
}

export interface DocumentEntity extends EntityBase<'document'> {
  path: string;
  title: string;
  /** sha256 of the raw content */
  contentHash: string;
  frontmatter: FrontmatterMetadata;
}

export interface HeadingEntity extends EntityBase<'heading'> {
  level: number;
  text: string;
  parentUri: string | null;
}

export interface SectionEntity extends EntityBase<'section'> {
  headingUri: string;
}

export interface ListEntity extends EntityBase<'list'> {
  ordered: boolean;
  level: number;
  itemCount: number;
  parentUri: string | null;
}

export interface ListItemEntity extends EntityBase<'list_item'> {
  text: string;
  ordered: boolean;
  level: number;
  listUri: string | null;
}

export interface TableEntity extends EntityBase<'table'> {
  headers: string[];
  rowCount: number;
  columnCount: number;
}

export interface CodeBlockEntity extends EntityBase<'code_block'> {
  language: string | null;
  code: string;
}

export interface BlockquoteEntity extends EntityBase<'blockquote'> {
  level: number;
  text: string;
}

export interface TodoEntity extends EntityBase<'todo'> {
  description: string;
  completed: boolean;
  dueDate?: string;
  priority?: string;
  /** Person URIs */
  assigneeUris: string[];
  /** Section or list the item sits in */
  parentUri: string | null;
}

export interface TagEntity extends EntityBase<'tag'> {
  name: string;
  category?: string;
  source: TagSource;
}

export interface LinkEntity extends EntityBase<'link'> {
  text: string;
  url: string;
  title?: string;
  internal: boolean;
}

export interface ReferenceEntity extends EntityBase<'reference'> {
  key: string;
  url: string;
  title?: string;
}

export interface CitationEntity extends EntityBase<'citation'> {
  text: string;
  key?: string;
}

export interface WikiLinkEntity extends EntityBase<'wikilink'> {
  targetPath: string;
  alias?: string;
  originalText: string;
  /** Weak reference to the linked document */
  resolvedDocumentUri: string | null;
  /** Entities recognised in the link's display text */
  entityUris: string[];
}

interface RecognizedEntityBase<T extends string> extends EntityBase<T> {
  text: string;
  /** Label reported by the recogniser, e.g. PERSON */
  entityLabel: string;
  confidence?: number;
}

export interface PersonEntity extends RecognizedEntityBase<'person'> {
  fullName: string;
  givenName?: string;
  familyName?: string;
  aliases: string[];
  roles: string[];
}

export interface OrganizationEntity extends RecognizedEntityBase<'organization'> {
  name: string;
}

export interface LocationEntity extends RecognizedEntityBase<'location'> {
  name: string;
}

export interface DateEntity extends RecognizedEntityBase<'date'> {
  dateValue: string;
}

export type GenericNamedEntity = RecognizedEntityBase<'named_entity'>;

export type RecognizedKbEntity =
  | PersonEntity
  | OrganizationEntity
  | LocationEntity
  | DateEntity
  | GenericNamedEntity;

export type KbEntity =
  | DocumentEntity
  | HeadingEntity
  | SectionEntity
  | ListEntity
  | ListItemEntity
  | TableEntity
  | CodeBlockEntity
  | BlockquoteEntity
  | TodoEntity
  | TagEntity
  | LinkEntity
  | ReferenceEntity
  | CitationEntity
  | WikiLinkEntity
  | RecognizedKbEntity;

export type EntityType = KbEntity['type'];
