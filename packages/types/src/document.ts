/**
 * Source document types
 */

export interface SourceDocument {
  /** Path relative to the knowledge-base root (key) */
  path: string;
  /** Raw Markdown text */
  content: string;
  /** Title, when already known to the caller */
  title?: string;
}

/**
 * Identity of a document as registered before cross-document resolution
 */
export interface DocumentIdentity {
  /** Canonical document URI */
  documentId: string;
  /** Original path */
  path: string;
  /** Path with its trailing extension removed */
  pathWithoutExtension: string;
}

/**
 * Descriptive fields read from front matter. Key lookup ignores case;
 * `date`/`created` and `modified`/`updated` are synonyms.
 */
export interface FrontmatterMetadata {
  /** Several authors are joined with `, ` */
  author: string | null;
  description: string | null;
  summary: string | null;
  /** As written, e.g. `2024-03-01` */
  dateCreated: string | null;
  dateModified: string | null;
  /** Every other key except `title`, `tags` and `categories` */
  custom: Record<string, unknown>;
}
