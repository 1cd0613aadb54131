/**
 * @kb-graph/types
 * Shared type definitions for kb-graph
 */

// Document
export type { SourceDocument, DocumentIdentity, FrontmatterMetadata } from './document.js';

// Elements
export type {
  Position,
  HeadingElement,
  SectionElement,
  ListElement,
  ListItemElement,
  TableCell,
  TableElement,
  CodeBlockElement,
  BlockquoteElement,
  TodoItemElement,
  TagSource,
  TagElement,
  LinkElement,
  ReferenceElement,
  CitationElement,
  WikiLinkElement,
  FrontmatterElement,
  ContentElement,
  ElementKind,
  ElementOf,
} from './elements.js';

// Entities
export type {
  DocumentEntity,
  HeadingEntity,
  SectionEntity,
  ListEntity,
  ListItemEntity,
  TableEntity,
  CodeBlockEntity,
  BlockquoteEntity,
  TodoEntity,
  TagEntity,
  LinkEntity,
  ReferenceEntity,
  CitationEntity,
  WikiLinkEntity,
  PersonEntity,
  OrganizationEntity,
  LocationEntity,
  DateEntity,
  GenericNamedEntity,
  RecognizedKbEntity,
  KbEntity,
  EntityType,
} from './entities.js';

// Recognizer
export type { RecognizedEntity, EntityRecognizer } from './recognizer.js';

// Config
export type {
  KbGraphConfig,
  ProjectConfig,
  FilesConfig,
  NamespaceConfig,
  ExtractionConfig,
  OutputConfig,
  StorageConfig,
  ProcessingConfig,
  ExtractorName,
  GraphFormat,
} from './config.js';
export { DEFAULT_CONFIG, EXTRACTOR_NAMES, GRAPH_FORMATS } from './config.js';
export {
  ConfigLoader,
  CONFIG_ENV_VAR,
  validateConfig,
  ConfigValidationError,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type KbGraphConfigInput,
} from './config/index.js';

// Storage
export type {
  DocumentStore,
  DocumentRecord,
  DocumentRecordMetadata,
  EntityRecord,
  TagRecord,
  LinkRecord,
  WikiLinkRecord,
} from './storage.js';
