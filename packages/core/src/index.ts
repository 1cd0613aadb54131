export { IdGenerator, slugify, isAbsoluteUri, stripExtension } from './identity/id-generator.js';
export { DocumentRegistry, RegistrySealedError, RegistryNotSealedError } from './registry/document-registry.js';
export * from './extractors/index.js';
export { Processor, titleFromPath } from './processor/processor.js';
export type { ProcessorOptions, ProcessedDocument } from './processor/processor.js';
export { EntityBuilder, parseTodoAttributes, recognizedType, contentHash } from './processor/entity-builder.js';
export { GraphAssembler } from './rdf/graph-assembler.js';
export type { DocumentGraph, GraphAssemblerOptions } from './rdf/graph-assembler.js';
export { serializeGraph, parseGraph, GRAPH_FILE_EXTENSIONS } from './rdf/serializer.js';
export {
  loadVocabulary,
  vocabularyPrefixes,
  DEFAULT_VOCABULARY_NAMESPACE,
  VOCABULARY_ENV_VAR,
  SCHEMA_NS,
} from './rdf/vocabulary.js';
export type { Vocabulary } from './rdf/vocabulary.js';
export { BatchPipeline, DocumentTimeoutError } from './pipeline/batch-pipeline.js';
export type { BatchPipelineOptions, BatchReport, BatchResult, BatchError } from './pipeline/batch-pipeline.js';
export { DictionaryRecognizer, NullRecognizer } from './recognizer/dictionary-recognizer.js';
export { parseRecognizedEntities, RecognizedEntitySchema, DictionaryEntrySchema } from './recognizer/recognizer-schema.js';
export type { DictionaryEntry } from './recognizer/recognizer-schema.js';
export { FileDiscovery } from './discovery/file-discovery.js';
export type { FileDiscoveryOptions } from './discovery/file-discovery.js';
