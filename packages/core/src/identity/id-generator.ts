import type { DocumentIdentity } from '@kb-graph/types';
import { DEFAULT_CONFIG } from '@kb-graph/types';

/** Anything that is not a letter, digit, underscore, whitespace or hyphen */
const NON_SLUG_CHARS = /[^\p{L}\p{N}_\s-]/gu;
const SEPARATOR_RUNS = /[-\s]+/g;
const EDGE_HYPHENS = /^-+|-+$/g;

/**
 * Normalize text into a URL-safe slug.
 *
 * Punctuation and symbols are removed in place (`C++` → `c`,
 * `config.yaml` → `configyaml`), whitespace and hyphen runs become a
 * single hyphen. Text that normalizes to nothing yields `unnamed-<kind>`.
 */
export function slugify(text: string, kind: string = 'entity'): string {
  const slug = text
    .toLowerCase()
    .replace(NON_SLUG_CHARS, '')
    .replace(SEPARATOR_RUNS, '-')
    .replace(EDGE_HYPHENS, '');

  return slug.length > 0 ? slug : `unnamed-${kind}`;
}

/**
 * True when the reference is already an absolute URI
 */
export function isAbsoluteUri(reference: string): boolean {
  return reference.includes('://');
}

/**
 * Strip a trailing file extension (`notes/adr-001.md` → `notes/adr-001`)
 */
export function stripExtension(filePath: string): string {
  const slash = filePath.lastIndexOf('/');
  const dot = filePath.lastIndexOf('.');
  return dot > slash + 1 ? filePath.slice(0, dot) : filePath;
}

/**
 * Deterministic identifier generation.
 *
 * Document URIs depend only on the path; entity URIs are scoped under
 * their owning document so the same text in two documents never collides.
 */
export class IdGenerator {
  readonly baseUri: string;

  constructor(baseUri: string = DEFAULT_CONFIG.namespace.baseUri) {
    this.baseUri = baseUri.endsWith('/') ? baseUri : `${baseUri}/`;
  }

  /**
   * `<base>documents/<url-encoded path>`
   */
  generateDocumentId(documentPath: string): string {
    const encoded = documentPath
      .replace(/\\/g, '/')
      .split('/')
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `${this.baseUri}documents/${encoded}`;
  }

  createDocumentIdentity(documentPath: string): DocumentIdentity {
    return {
      documentId: this.generateDocumentId(documentPath),
      path: documentPath,
      pathWithoutExtension: stripExtension(documentPath),
    };
  }

  /**
   * `<document URI>/<kind>/<slug>`. A reference without a scheme is
   * treated as a document path first.
   */
  generateEntityId(documentRef: string, kind: string, text: string): string {
    const documentUri = isAbsoluteUri(documentRef)
      ? documentRef
      : this.generateDocumentId(documentRef);
    return `${documentUri.replace(/\/+$/, '')}/${kind}/${slugify(text, kind)}`;
  }

  generateTodoId(documentRef: string, text: string): string {
    return this.generateEntityId(documentRef, 'todo', text);
  }

  generateHeadingId(documentRef: string, text: string): string {
    return this.generateEntityId(documentRef, 'heading', text);
  }

  generateWikiLinkId(documentRef: string, target: string): string {
    return this.generateEntityId(documentRef, 'wikilink', target);
  }

  /**
   * People are shared across documents: `<base>people/<slug>`
   */
  generatePersonId(name: string): string {
    return `${this.baseUri}people/${slugify(name, 'person')}`;
  }
}
