import { DataFactory, Store } from 'n3';
import type { NamedNode, Quad_Object } from 'n3';
import type { EntityType, KbEntity } from '@kb-graph/types';
import { DEFAULT_CONFIG } from '@kb-graph/types';
import { RDF_NS, RDFS_NS, SCHEMA_NS, XSD_NS, loadVocabulary, type Vocabulary } from './vocabulary.js';

const { namedNode, literal, quad } = DataFactory;

/** An entity collection as triples */
export type DocumentGraph = Store;

export interface GraphAssemblerOptions {
  /** Base for identifiers that are not absolute URIs */
  baseUri?: string;
  vocabulary?: Vocabulary;
}

const KB_CLASSES: Record<EntityType, string> = {
  document: 'Document',
  heading: 'Heading',
  section: 'Section',
  list: 'List',
  list_item: 'ListItem',
  table: 'Table',
  code_block: 'CodeBlock',
  blockquote: 'Blockquote',
  todo: 'TodoItem',
  tag: 'Tag',
  link: 'Link',
  reference: 'Reference',
  citation: 'Citation',
  wikilink: 'WikiLink',
  person: 'Person',
  organization: 'Organization',
  location: 'Location',
  date: 'DateEntity',
  named_entity: 'NamedEntity',
};

const SCHEMA_CLASSES: Partial<Record<EntityType, string>> = {
  document: 'CreativeWork',
  todo: 'Action',
  person: 'Person',
  organization: 'Organization',
  location: 'Place',
  date: 'Date',
};

const rdf = (term: string): NamedNode => namedNode(`${RDF_NS}${term}`);
const rdfs = (term: string): NamedNode => namedNode(`${RDFS_NS}${term}`);
const schema = (term: string): NamedNode => namedNode(`${SCHEMA_NS}${term}`);
const xsd = (term: string): NamedNode => namedNode(`${XSD_NS}${term}`);

/**
 * Statements about one subject
 */
class SubjectWriter {
  constructor(
    private store: Store,
    private subject: NamedNode,
    private resolve: (reference: string) => NamedNode
  ) {}

  add(predicate: NamedNode, object: Quad_Object): void {
    this.store.addQuad(quad(this.subject, predicate, object));
  }

  text(predicate: NamedNode, value: string | null | undefined): void {
    if (value !== null && value !== undefined) {
      this.add(predicate, literal(value));
    }
  }

  integer(predicate: NamedNode, value: number): void {
    this.add(predicate, literal(String(value), xsd('integer')));
  }

  boolean(predicate: NamedNode, value: boolean): void {
    this.add(predicate, literal(String(value), xsd('boolean')));
  }

  double(predicate: NamedNode, value: number | undefined): void {
    if (value !== undefined) {
      this.add(predicate, literal(String(value), xsd('double')));
    }
  }

  date(predicate: NamedNode, value: string | undefined): void {
    if (value !== undefined) {
      this.add(predicate, literal(value, xsd('date')));
    }
  }

  dateTime(predicate: NamedNode, value: Date): void {
    this.add(predicate, literal(value.toISOString(), xsd('dateTime')));
  }

  /**
   * `YYYY-MM-DD` as xsd:date, other parseable values as xsd:dateTime,
   * anything else as plain text
   */
  temporal(predicate: NamedNode, value: string): void {
    if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
      this.date(predicate, value);
      return;
    }
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      this.text(predicate, value);
    } else {
      this.dateTime(predicate, parsed);
    }
  }

  object(predicate: NamedNode, reference: string | null | undefined): void {
    if (reference) {
      this.add(predicate, this.resolve(reference));
    }
  }
}

/**
 * Converts entities into RDF statements
 */
export class GraphAssembler {
  private baseUri: string;
  private namespace: string;

  constructor(options: GraphAssemblerOptions = {}) {
    this.baseUri = options.baseUri ?? DEFAULT_CONFIG.namespace.baseUri;
    this.namespace = (options.vocabulary ?? loadVocabulary()).namespace;
  }

  /**
   * Absolute URIs are used as given; anything else is joined to the base
   */
  resolveUri(reference: string): string {
    if (reference.includes('://')) {
      return reference;
    }
    return `${this.baseUri.replace(/\/+$/, '')}/${reference.replace(/^\/+/, '')}`;
  }

  kb(term: string): NamedNode {
    return namedNode(`${this.namespace}${term}`);
  }

  assemble(entities: KbEntity[], graph: DocumentGraph = new Store()): DocumentGraph {
    for (const entity of entities) {
      this.addEntity(graph, entity);
    }
    return graph;
  }

  private addEntity(graph: DocumentGraph, entity: KbEntity): void {
    const kb = (term: string) => this.kb(term);
    const out = new SubjectWriter(graph, namedNode(this.resolveUri(entity.id)), (reference) =>
      namedNode(this.resolveUri(reference))
    );

    out.add(rdf('type'), kb(KB_CLASSES[entity.type]));
    const schemaClass = SCHEMA_CLASSES[entity.type];
    if (schemaClass) {
      out.add(rdf('type'), schema(schemaClass));
    }
    if (entity.label && entity.label.trim().length > 0) {
      out.text(rdfs('label'), entity.label);
    }
    out.object(kb('sourceDocument'), entity.sourceDocumentUri);
    if (entity.span) {
      out.integer(kb('startOffset'), entity.span[0]);
      out.integer(kb('endOffset'), entity.span[1]);
    }
    // dates written in front matter replace the processing time
    const written = entity.type === 'document' ? entity.frontmatter : null;
    if (written?.dateCreated) {
      out.temporal(schema('dateCreated'), written.dateCreated);
    } else {
      out.dateTime(schema('dateCreated'), entity.createdAt);
    }
    if (written?.dateModified) {
      out.temporal(schema('dateModified'), written.dateModified);
    } else {
      out.dateTime(schema('dateModified'), entity.updatedAt);
    }

    switch (entity.type) {
      case 'document':
        out.text(kb('path'), entity.path);
        out.text(schema('name'), entity.title);
        out.text(kb('contentHash'), entity.contentHash);
        out.text(schema('author'), entity.frontmatter.author);
        out.text(schema('description'), entity.frontmatter.description);
        out.text(schema('abstract'), entity.frontmatter.summary);
        break;
      case 'heading':
        out.integer(kb('level'), entity.level);
        out.text(schema('text'), entity.text);
        out.object(kb('parentElement'), entity.parentUri);
        break;
      case 'section':
        out.object(kb('heading'), entity.headingUri);
        break;
      case 'list':
        out.boolean(kb('ordered'), entity.ordered);
        out.integer(kb('level'), entity.level);
        out.integer(kb('itemCount'), entity.itemCount);
        out.object(kb('parentElement'), entity.parentUri);
        break;
      case 'list_item':
        out.text(schema('text'), entity.text);
        out.boolean(kb('ordered'), entity.ordered);
        out.integer(kb('level'), entity.level);
        out.object(kb('parentElement'), entity.listUri);
        break;
      case 'table':
        out.integer(kb('rowCount'), entity.rowCount);
        out.integer(kb('columnCount'), entity.columnCount);
        for (const header of entity.headers) {
          out.text(kb('header'), header);
        }
        break;
      case 'code_block':
        out.text(kb('language'), entity.language);
        out.text(schema('text'), entity.code);
        break;
      case 'blockquote':
        out.integer(kb('level'), entity.level);
        out.text(schema('text'), entity.text);
        break;
      case 'todo':
        out.text(schema('description'), entity.description);
        out.boolean(kb('isCompleted'), entity.completed);
        out.date(kb('dueDate'), entity.dueDate);
        out.text(kb('priority'), entity.priority);
        for (const assignee of entity.assigneeUris) {
          out.object(kb('assignee'), assignee);
        }
        out.object(kb('parentElement'), entity.parentUri);
        break;
      case 'tag':
        out.text(schema('name'), entity.name);
        out.text(kb('category'), entity.category);
        out.text(kb('tagSource'), entity.source);
        break;
      case 'link':
        out.text(schema('text'), entity.text);
        out.text(schema('url'), entity.url);
        out.boolean(kb('isInternal'), entity.internal);
        out.text(kb('linkTitle'), entity.title);
        break;
      case 'reference':
        out.text(kb('referenceKey'), entity.key);
        out.text(schema('url'), entity.url);
        out.text(kb('linkTitle'), entity.title);
        break;
      case 'citation':
        out.text(schema('text'), entity.text);
        out.text(kb('citationKey'), entity.key);
        break;
      case 'wikilink':
        out.text(kb('originalText'), entity.originalText);
        out.text(kb('targetPath'), entity.targetPath);
        out.text(kb('alias'), entity.alias);
        out.object(kb('resolvedDocument'), entity.resolvedDocumentUri);
        for (const mentioned of entity.entityUris) {
          out.object(kb('mentions'), mentioned);
        }
        break;
      case 'person':
        out.text(kb('entityType'), entity.entityLabel);
        out.double(kb('confidence'), entity.confidence);
        out.text(kb('fullName'), entity.fullName);
        out.text(schema('givenName'), entity.givenName);
        out.text(schema('familyName'), entity.familyName);
        for (const alias of entity.aliases) {
          out.text(schema('alternateName'), alias);
        }
        for (const role of entity.roles) {
          out.text(schema('roleName'), role);
        }
        break;
      case 'organization':
      case 'location':
        out.text(kb('entityType'), entity.entityLabel);
        out.double(kb('confidence'), entity.confidence);
        out.text(schema('name'), entity.name);
        break;
      case 'date':
        out.text(kb('entityType'), entity.entityLabel);
        out.double(kb('confidence'), entity.confidence);
        out.text(kb('dateValue'), entity.dateValue);
        break;
      case 'named_entity':
        out.text(kb('entityType'), entity.entityLabel);
        out.double(kb('confidence'), entity.confidence);
        break;
      default: {
        const unhandled: never = entity;
        throw new Error(`Unhandled entity: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
