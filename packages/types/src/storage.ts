/**
 * DocumentStore interface
 */

import type { FrontmatterMetadata } from './document.js';
import type { TagSource } from './elements.js';

export interface EntityRecord {
  text: string;
  label: string;
  start: number;
  end: number;
  confidence: number | null;
}

export interface TagRecord {
  name: string;
  category: string | null;
  source: TagSource;
}

export interface LinkRecord {
  text: string;
  url: string;
  title: string | null;
  internal: boolean;
}

export interface WikiLinkRecord {
  targetPath: string;
  alias: string | null;
  originalText: string;
  resolvedDocumentUri: string | null;
  /** Entities recognised in the display text */
  entities: EntityRecord[];
}

export interface DocumentRecordMetadata {
  createdAt: Date;
  updatedAt: Date;
  /** sha256 of the content (set by the store) */
  contentHash?: string;
}

/**
 * What is persisted per processed document
 */
export interface DocumentRecord {
  documentId: string;
  path: string;
  title: string;
  tags: TagRecord[];
  links: LinkRecord[];
  wikilinks: WikiLinkRecord[];
  entities: EntityRecord[];
  /** Raw text, used for the content hash */
  content: string;
  /** Always set by the processor */
  frontmatter?: FrontmatterMetadata;
  metadata: DocumentRecordMetadata;
}

export interface DocumentStore {
  /**
   * Save a record
   */
  save(record: DocumentRecord): Promise<void>;

  /**
   * Get a record by document id
   */
  get(documentId: string): Promise<DocumentRecord | null>;

  /**
   * Delete a record
   */
  delete(documentId: string): Promise<void>;

  /**
   * List every stored document id
   */
  list(): Promise<string[]>;

  /**
   * Check whether a record exists
   */
  exists(documentId: string): Promise<boolean>;
}
