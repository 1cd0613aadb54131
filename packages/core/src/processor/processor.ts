import type {
  ContentElement,
  DocumentIdentity,
  DocumentRecord,
  EntityRecognizer,
  EntityRecord,
  FrontmatterMetadata,
  KbEntity,
  RecognizedEntity,
  SourceDocument,
  WikiLinkElement,
} from '@kb-graph/types';
import { EXTRACTOR_NAMES } from '@kb-graph/types';
import { IdGenerator } from '../identity/id-generator.js';
import type { DocumentRegistry } from '../registry/document-registry.js';
import { createExtractors, type Extractor } from '../extractors/index.js';
import { frontmatterMetadata, readFrontmatter } from '../extractors/frontmatter.js';
import { parseRecognizedEntities } from '../recognizer/recognizer-schema.js';
import { EntityBuilder } from './entity-builder.js';

export interface ProcessorOptions {
  idGenerator?: IdGenerator;
  /** Sealed registry for WikiLink resolution */
  registry?: DocumentRegistry | null;
  /** Defaults to every extractor, bound to `registry` */
  extractors?: Extractor[];
  recognizer?: EntityRecognizer | null;
  clock?: () => Date;
}

export interface ProcessedDocument {
  identity: DocumentIdentity;
  title: string;
  elements: ContentElement[];
  entities: KbEntity[];
  warnings: string[];
  record: DocumentRecord;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toRecord(entity: RecognizedEntity): EntityRecord {
  return {
    text: entity.text,
    label: entity.label,
    start: entity.start,
    end: entity.end,
    confidence: entity.confidence ?? null,
  };
}

/**
 * Keeps the first entity for each text
 */
function uniqueByText(entities: RecognizedEntity[]): RecognizedEntity[] {
  const seen = new Set<string>();
  return entities.filter((entity) => {
    if (seen.has(entity.text)) {
      return false;
    }
    seen.add(entity.text);
    return true;
  });
}

function shift(entities: RecognizedEntity[], offset: number): RecognizedEntity[] {
  return entities.map((entity) => ({ ...entity, start: entity.start + offset, end: entity.end + offset }));
}

/**
 * `notes/my_first-note.md` → `my first note`
 */
export function titleFromPath(documentPath: string): string {
  const name = documentPath.split(/[\\/]/).pop() ?? documentPath;
  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  return stem.replace(/[-_]+/g, ' ').trim() || documentPath;
}

/**
 * Runs the extractors over one document, merges recognised entities and
 * assigns canonical identifiers
 */
export class Processor {
  private ids: IdGenerator;
  private extractors: Extractor[];
  private recognizer: EntityRecognizer | null;
  private clock: () => Date;
  private builder: EntityBuilder;

  constructor(options: ProcessorOptions = {}) {
    this.ids = options.idGenerator ?? new IdGenerator();
    this.extractors =
      options.extractors ?? createExtractors(EXTRACTOR_NAMES, { registry: options.registry ?? null });
    this.recognizer = options.recognizer ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.builder = new EntityBuilder(this.ids);
  }

  async process(document: SourceDocument): Promise<ProcessedDocument> {
    const identity = this.ids.createDocumentIdentity(document.path);
    const warnings: string[] = [];
    const now = this.clock();

    const elements = this.extract(document, warnings);
    const frontmatter = readFrontmatter(document.content);
    const title = this.resolveTitle(document, frontmatter?.data ?? {});
    const metadata = frontmatterMetadata(frontmatter?.data ?? {});

    const bodyOffset = frontmatter ? frontmatter.element.position.end : 0;
    const documentEntities = shift(
      await this.recognize(document.content.slice(bodyOffset), warnings),
      bodyOffset
    );

    const wikiLinks = elements.filter((element): element is WikiLinkElement => element.kind === 'wikilink');
    const wikiLinkEntities = new Map<string, RecognizedEntity[]>();
    for (const link of wikiLinks) {
      const display = link.alias ?? link.targetPath;
      const found = await this.recognize(display, warnings);
      const offset = link.position.start + Math.max(link.originalText.indexOf(display), 0);
      wikiLinkEntities.set(link.id, shift(found, offset));
    }

    const entities = this.builder.build({
      identity,
      title,
      content: document.content,
      frontmatter: metadata,
      elements,
      documentEntities,
      wikiLinkEntities,
      now,
    });

    return {
      identity,
      title,
      elements,
      entities,
      warnings,
      record: this.buildRecord(
        identity,
        title,
        document.content,
        metadata,
        elements,
        documentEntities,
        wikiLinkEntities,
        now
      ),
    };
  }

  private extract(document: SourceDocument, warnings: string[]): ContentElement[] {
    const elements: ContentElement[] = [];

    for (const extractor of this.extractors) {
      try {
        elements.push(...extractor.extract(document));
      } catch (error) {
        const warning = `${extractor.name}: ${errorMessage(error)}`;
        console.warn(`[Processor] ${document.path}: ${warning}`);
        warnings.push(warning);
      }
    }

    // extractor registration order, then document order within each extractor
    return elements;
  }

  private resolveTitle(document: SourceDocument, frontmatter: Record<string, unknown>): string {
    const fromFrontmatter = frontmatter.title;
    if (typeof fromFrontmatter === 'string' && fromFrontmatter.trim().length > 0) {
      return fromFrontmatter.trim();
    }
    if (document.title && document.title.trim().length > 0) {
      return document.title.trim();
    }
    return titleFromPath(document.path);
  }

  private async recognize(text: string, warnings: string[]): Promise<RecognizedEntity[]> {
    if (!this.recognizer || text.trim().length === 0) {
      return [];
    }

    try {
      return parseRecognizedEntities(await this.recognizer.recognize(text));
    } catch (error) {
      warnings.push(`recognizer: ${errorMessage(error)}`);
      return [];
    }
  }

  private buildRecord(
    identity: DocumentIdentity,
    title: string,
    content: string,
    frontmatter: FrontmatterMetadata,
    elements: ContentElement[],
    documentEntities: RecognizedEntity[],
    wikiLinkEntities: Map<string, RecognizedEntity[]>,
    now: Date
  ): DocumentRecord {
    const record: DocumentRecord = {
      documentId: identity.documentId,
      path: identity.path,
      title,
      tags: [],
      links: [],
      wikilinks: [],
      entities: uniqueByText([...documentEntities, ...[...wikiLinkEntities.values()].flat()]).map(toRecord),
      content,
      frontmatter,
      metadata: { createdAt: now, updatedAt: now },
    };

    for (const element of elements) {
      switch (element.kind) {
        case 'tag':
          record.tags.push({ name: element.name, category: element.category, source: element.source });
          break;
        case 'link':
          record.links.push({
            text: element.text,
            url: element.url,
            title: element.title,
            internal: element.internal,
          });
          break;
        case 'wikilink':
          record.wikilinks.push({
            targetPath: element.targetPath,
            alias: element.alias,
            originalText: element.originalText,
            resolvedDocumentUri: element.resolvedDocumentUri,
            entities: (wikiLinkEntities.get(element.id) ?? []).map(toRecord),
          });
          break;
        default:
          break;
      }
    }

    return record;
  }
}
