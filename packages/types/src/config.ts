/**
 * Configuration file types
 */

export type ExtractorName =
  | 'frontmatter'
  | 'heading-section'
  | 'list-table'
  | 'code-quote'
  | 'todo'
  | 'tag'
  | 'link-reference'
  | 'wikilink';

export const EXTRACTOR_NAMES: readonly ExtractorName[] = [
  'frontmatter',
  'heading-section',
  'list-table',
  'code-quote',
  'todo',
  'tag',
  'link-reference',
  'wikilink',
];

export type GraphFormat = 'turtle' | 'n-triples' | 'n-quads' | 'trig';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['turtle', 'n-triples', 'n-quads', 'trig'];

export interface KbGraphConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  namespace: NamespaceConfig;
  extraction: ExtractionConfig;
  output: OutputConfig;
  storage: StorageConfig;
  processing: ProcessingConfig;
}

export interface ProjectConfig {
  /** Project name */
  name: string;
  /** Knowledge-base root */
  root: string;
}

export interface FilesConfig {
  /** Glob patterns to include */
  include: string[];
  /** Glob patterns to exclude */
  exclude: string[];
  /** Honour .gitignore */
  ignoreGitignore: boolean;
}

export interface NamespaceConfig {
  /** Base URI for generated identifiers (ends with `/`) */
  baseUri: string;
}

export interface ExtractionConfig {
  /** Extractors to run, in order */
  extractors: ExtractorName[];
  /** Run entity recognition over bodies and WikiLink labels */
  recognizeEntities: boolean;
  /** JSON file of `{ text, label }` entries for the dictionary recogniser */
  dictionaryPath: string | null;
}

export interface OutputConfig {
  /** Where graph files are written */
  directory: string;
  format: GraphFormat;
}

export interface StorageConfig {
  /** Where document records are stored */
  documentsPath: string;
}

export interface ProcessingConfig {
  /** Documents processed at the same time */
  maxConcurrent: number;
  /** Per-document timeout in ms (0 disables it) */
  documentTimeoutMs: number;
}

/** Default configuration */
export const DEFAULT_CONFIG: KbGraphConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.md'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/.kb-graph/**'],
    ignoreGitignore: true,
  },
  namespace: {
    baseUri: 'http://example.org/kb/',
  },
  extraction: {
    extractors: [...EXTRACTOR_NAMES],
    recognizeEntities: false,
    dictionaryPath: null,
  },
  output: {
    directory: '.kb-graph/rdf',
    format: 'turtle',
  },
  storage: {
    documentsPath: '.kb-graph/documents',
  },
  processing: {
    maxConcurrent: 4,
    documentTimeoutMs: 0,
  },
};
