import { createHash } from 'crypto';
import type {
  ContentElement,
  DocumentEntity,
  DocumentIdentity,
  EntityType,
  FrontmatterMetadata,
  KbEntity,
  RecognizedEntity,
  RecognizedKbEntity,
  TodoEntity,
  TodoItemElement,
} from '@kb-graph/types';
import type { IdGenerator } from '../identity/id-generator.js';

export interface EntityBuildInput {
  identity: DocumentIdentity;
  title: string;
  content: string;
  frontmatter: FrontmatterMetadata;
  elements: ContentElement[];
  /** Recognised in the body, offsets into the raw content */
  documentEntities: RecognizedEntity[];
  /** Recognised in each wikilink's display text, keyed by local id */
  wikiLinkEntities: Map<string, RecognizedEntity[]>;
  now: Date;
}

type RecognizedType = RecognizedKbEntity['type'];

const LABEL_TYPES = new Map<string, RecognizedType>([
  ['PERSON', 'person'],
  ['PER', 'person'],
  ['ORG', 'organization'],
  ['ORGANIZATION', 'organization'],
  ['LOC', 'location'],
  ['LOCATION', 'location'],
  ['GPE', 'location'],
  ['DATE', 'date'],
  ['TIME', 'date'],
]);

const DUE_DATE = /\bdue:(\d{4}-\d{2}-\d{2})\b/i;
const PRIORITY = /\bpriority:(high|medium|low)\b/i;
const ASSIGNEE = /(?:^|\s)@([A-Za-z0-9_][\w.-]*)(?![\w./-])/g;

export function recognizedType(label: string): RecognizedType {
  return LABEL_TYPES.get(label.toUpperCase()) ?? 'named_entity';
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * `due:2024-11-30`, `priority:high` and `@name` tokens in todo text
 */
export function parseTodoAttributes(text: string): { dueDate?: string; priority?: string; assignees: string[] } {
  const due = DUE_DATE.exec(text);
  const priority = PRIORITY.exec(text);
  const assignees = [...text.matchAll(ASSIGNEE)]
    .map((match) => match[1].replace(/[.-]+$/, ''))
    .filter((name) => name.length > 0);

  return {
    ...(due ? { dueDate: due[1] } : {}),
    ...(priority ? { priority: priority[1].toLowerCase() } : {}),
    assignees: [...new Set(assignees)],
  };
}

/**
 * Hands out unique entity URIs within one document. A repeated slug of
 * the same kind gets `-2`, `-3`, ... in document order, so an edit that
 * adds or removes an earlier duplicate renumbers the later ones.
 */
class IdAllocator {
  private used = new Set<string>();

  constructor(
    private ids: IdGenerator,
    private documentUri: string
  ) {}

  allocate(kind: EntityType, text: string): string {
    const base = this.ids.generateEntityId(this.documentUri, kind, text);
    let id = base;
    for (let suffix = 2; this.used.has(id); suffix++) {
      id = `${base}-${suffix}`;
    }
    this.used.add(id);
    return id;
  }
}

function entityTypeOf(element: ContentElement): EntityType | null {
  switch (element.kind) {
    case 'frontmatter':
      return null;
    case 'todo_item':
      return 'todo';
    default:
      return element.kind;
  }
}

/**
 * Innermost element of the given kind whose span holds the offset
 */
function innermost(elements: ContentElement[], kind: 'list' | 'section', offset: number): ContentElement | null {
  let best: ContentElement | null = null;
  for (const element of elements) {
    if (element.kind !== kind) {
      continue;
    }
    const { start, end } = element.position;
    if (start <= offset && offset < end && (best === null || start >= best.position.start)) {
      best = element;
    }
  }
  return best;
}

/**
 * Turns a document's elements and recognised spans into entities
 */
export class EntityBuilder {
  constructor(private ids: IdGenerator) {}

  build(input: EntityBuildInput): KbEntity[] {
    const { identity, elements, now } = input;
    const documentUri = identity.documentId;
    const allocator = new IdAllocator(this.ids, documentUri);
    const elementsById = new Map(elements.map((element) => [element.id, element]));
    const uriByLocalId = new Map<string, string>();
    const ordinals = new Map<EntityType, number>();

    // every element gets its URI first so parents can be referenced in any order
    for (const element of elements) {
      const type = entityTypeOf(element);
      if (type === null) {
        continue;
      }
      const ordinal = (ordinals.get(type) ?? 0) + 1;
      ordinals.set(type, ordinal);
      uriByLocalId.set(element.id, allocator.allocate(type, this.discriminator(element, elementsById, ordinal)));
    }

    const recognizedByText = new Map<string, RecognizedKbEntity>();
    const claim = (span: RecognizedEntity): RecognizedKbEntity => {
      // first span with a given text wins, whatever its label
      const existing = recognizedByText.get(span.text);
      if (existing) {
        return existing;
      }
      const type = recognizedType(span.label);
      const entity = this.recognizedEntity(span, allocator.allocate(type, span.text), documentUri, now);
      recognizedByText.set(span.text, entity);
      return entity;
    };

    for (const span of input.documentEntities) {
      claim(span);
    }

    const document: DocumentEntity = {
      type: 'document',
      id: documentUri,
      createdAt: now,
      updatedAt: now,
      label: input.title,
      path: identity.path,
      title: input.title,
      contentHash: contentHash(input.content),
      frontmatter: input.frontmatter,
    };

    const structural: KbEntity[] = [];
    for (const element of elements) {
      const id = uriByLocalId.get(element.id);
      if (id === undefined) {
        continue;
      }

      const linked = element.kind === 'wikilink'
        ? (input.wikiLinkEntities.get(element.id) ?? []).map((span) => claim(span).id)
        : [];

      structural.push(this.elementEntity(element, id, {
        documentUri,
        now,
        elements,
        uriByLocalId,
        linkedEntityUris: [...new Set(linked)],
      }));
    }

    return [document, ...structural, ...recognizedByText.values()];
  }

  private discriminator(element: ContentElement, elementsById: Map<string, ContentElement>, ordinal: number): string {
    switch (element.kind) {
      case 'heading':
      case 'list_item':
      case 'todo_item':
      case 'citation':
        return element.text;
      case 'section': {
        const heading = elementsById.get(element.headingId);
        return heading && heading.kind === 'heading' ? heading.text : String(ordinal);
      }
      case 'tag':
        return element.category ? `${element.category} ${element.name}` : element.name;
      case 'link':
        return element.text || element.url;
      case 'reference':
        return element.key;
      case 'wikilink':
        return element.targetPath;
      case 'list':
      case 'table':
      case 'code_block':
      case 'blockquote':
      case 'frontmatter':
        return String(ordinal);
      default: {
        const unhandled: never = element;
        return String(unhandled);
      }
    }
  }

  private elementEntity(
    element: ContentElement,
    id: string,
    context: {
      documentUri: string;
      now: Date;
      elements: ContentElement[];
      uriByLocalId: Map<string, string>;
      linkedEntityUris: string[];
    }
  ): KbEntity {
    const { uriByLocalId } = context;
    const parentUri = element.parentId !== null ? uriByLocalId.get(element.parentId) ?? null : null;
    const base = {
      id,
      createdAt: context.now,
      updatedAt: context.now,
      sourceDocumentUri: context.documentUri,
      span: [element.position.start, element.position.end] satisfies [number, number],
    };

    switch (element.kind) {
      case 'heading':
        return { ...base, type: 'heading', label: element.text, level: element.level, text: element.text, parentUri };
      case 'section': {
        const headingUri = uriByLocalId.get(element.headingId) ?? context.documentUri;
        const heading = context.elements.find((candidate) => candidate.id === element.headingId);
        return {
          ...base,
          type: 'section',
          ...(heading && heading.kind === 'heading' ? { label: heading.text } : {}),
          headingUri,
        };
      }
      case 'list':
        return {
          ...base,
          type: 'list',
          ordered: element.ordered,
          level: element.level,
          itemCount: element.itemCount,
          parentUri,
        };
      case 'list_item':
        return {
          ...base,
          type: 'list_item',
          label: element.text,
          text: element.text,
          ordered: element.ordered,
          level: element.level,
          listUri: parentUri,
        };
      case 'table':
        return {
          ...base,
          type: 'table',
          headers: element.headers,
          rowCount: element.rowCount,
          columnCount: element.columnCount,
        };
      case 'code_block':
        return { ...base, type: 'code_block', language: element.language, code: element.code };
      case 'blockquote':
        return { ...base, type: 'blockquote', level: element.level, text: element.content };
      case 'todo_item':
        return this.todoEntity(element, base, parentUri ?? this.containerUri(element, context));
      case 'tag':
        return {
          ...base,
          type: 'tag',
          label: element.name,
          name: element.name,
          ...(element.category !== null ? { category: element.category } : {}),
          source: element.source,
        };
      case 'link':
        return {
          ...base,
          type: 'link',
          label: element.text,
          text: element.text,
          url: element.url,
          ...(element.title !== null ? { title: element.title } : {}),
          internal: element.internal,
        };
      case 'reference':
        return {
          ...base,
          type: 'reference',
          label: element.key,
          key: element.key,
          url: element.url,
          ...(element.title !== null ? { title: element.title } : {}),
        };
      case 'citation':
        return {
          ...base,
          type: 'citation',
          label: element.text,
          text: element.text,
          ...(element.key !== null ? { key: element.key } : {}),
        };
      case 'wikilink':
        return {
          ...base,
          type: 'wikilink',
          label: element.alias ?? element.targetPath,
          targetPath: element.targetPath,
          ...(element.alias !== null ? { alias: element.alias } : {}),
          originalText: element.originalText,
          resolvedDocumentUri: element.resolvedDocumentUri,
          entityUris: context.linkedEntityUris,
        };
      case 'frontmatter':
        throw new Error('Front matter has no entity');
      default: {
        const unhandled: never = element;
        throw new Error(`Unhandled element: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * The list holding a todo, else the innermost section around it
   */
  private containerUri(
    element: TodoItemElement,
    context: { elements: ContentElement[]; uriByLocalId: Map<string, string> }
  ): string | null {
    const container =
      innermost(context.elements, 'list', element.position.start) ??
      innermost(context.elements, 'section', element.position.start);
    return container ? context.uriByLocalId.get(container.id) ?? null : null;
  }

  private todoEntity(
    element: TodoItemElement,
    base: Omit<TodoEntity, 'type' | 'description' | 'completed' | 'assigneeUris' | 'parentUri'>,
    parentUri: string | null
  ): TodoEntity {
    const attributes = parseTodoAttributes(element.text);
    return {
      ...base,
      type: 'todo',
      label: element.text,
      description: element.text,
      completed: element.checked,
      ...(attributes.dueDate !== undefined ? { dueDate: attributes.dueDate } : {}),
      ...(attributes.priority !== undefined ? { priority: attributes.priority } : {}),
      assigneeUris: attributes.assignees.map((name) => this.ids.generatePersonId(name)),
      parentUri,
    };
  }

  private recognizedEntity(span: RecognizedEntity, id: string, documentUri: string, now: Date): RecognizedKbEntity {
    const base = {
      id,
      createdAt: now,
      updatedAt: now,
      label: span.text,
      sourceDocumentUri: documentUri,
      span: [span.start, span.end] satisfies [number, number],
      text: span.text,
      entityLabel: span.label,
      ...(span.confidence !== undefined ? { confidence: span.confidence } : {}),
    };

    const type = recognizedType(span.label);
    switch (type) {
      case 'person': {
        const parts = span.text.trim().split(/\s+/);
        return {
          ...base,
          type,
          fullName: span.text,
          ...(parts.length > 1 ? { givenName: parts[0], familyName: parts[parts.length - 1] } : {}),
          aliases: [],
          roles: [],
        };
      }
      case 'organization':
        return { ...base, type, name: span.text };
      case 'location':
        return { ...base, type, name: span.text };
      case 'date':
        return { ...base, type, dateValue: span.text };
      case 'named_entity':
        return { ...base, type };
      default: {
        const unhandled: never = type;
        throw new Error(`Unhandled entity type: ${String(unhandled)}`);
      }
    }
  }
}
