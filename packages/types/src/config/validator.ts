import type { ExtractorName, KbGraphConfig } from '../config.js';
import { EXTRACTOR_NAMES, GRAPH_FORMATS } from '../config.js';

/**
 * Raised when a configuration object has the wrong shape
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Configuration as read from a file: every section and field optional
 */
export type KbGraphConfigInput = {
  [K in keyof KbGraphConfig]?: KbGraphConfig[K] extends string ? string : Partial<KbGraphConfig[K]>;
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Validate a parsed configuration object
 */
export function validateConfig(config: unknown): KbGraphConfigInput {
  if (!isSection(config)) {
    throw new ConfigValidationError('Config must be an object');
  }

  const result: KbGraphConfigInput = {};

  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new ConfigValidationError('config.version must be a string');
    }
    result.version = config.version;
  }

  if (config.project !== undefined) {
    result.project = validateProjectConfig(config.project);
  }

  if (config.files !== undefined) {
    result.files = validateFilesConfig(config.files);
  }

  if (config.namespace !== undefined) {
    result.namespace = validateNamespaceConfig(config.namespace);
  }

  if (config.extraction !== undefined) {
    result.extraction = validateExtractionConfig(config.extraction);
  }

  if (config.output !== undefined) {
    result.output = validateOutputConfig(config.output);
  }

  if (config.storage !== undefined) {
    result.storage = validateStorageConfig(config.storage);
  }

  if (config.processing !== undefined) {
    result.processing = validateProcessingConfig(config.processing);
  }

  return result;
}

function section(value: unknown, name: string): Section {
  if (!isSection(value)) {
    throw new ConfigValidationError(`config.${name} must be an object`);
  }
  return value;
}

function optionalString(sec: Section, key: string, path: string): string | undefined {
  const value = sec[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigValidationError(`config.${path}.${key} must be a string`);
  }
  return value;
}

function optionalBoolean(sec: Section, key: string, path: string): boolean | undefined {
  const value = sec[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(`config.${path}.${key} must be a boolean`);
  }
  return value;
}

function optionalNumber(sec: Section, key: string, path: string): number | undefined {
  const value = sec[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new ConfigValidationError(`config.${path}.${key} must be a number`);
  }
  return value;
}

function optionalStringArray(sec: Section, key: string, path: string): string[] | undefined {
  const value = sec[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(`config.${path}.${key} must be an array`);
  }

  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigValidationError(`config.${path}.${key} must be an array of strings`);
    }
    strings.push(item);
  }
  return strings;
}

function validateProjectConfig(project: unknown): Partial<KbGraphConfig['project']> {
  const prj = section(project, 'project');
  return {
    name: optionalString(prj, 'name', 'project'),
    root: optionalString(prj, 'root', 'project'),
  };
}

function validateFilesConfig(files: unknown): Partial<KbGraphConfig['files']> {
  const f = section(files, 'files');
  return {
    include: optionalStringArray(f, 'include', 'files'),
    exclude: optionalStringArray(f, 'exclude', 'files'),
    ignoreGitignore: optionalBoolean(f, 'ignoreGitignore', 'files'),
  };
}

function validateNamespaceConfig(namespace: unknown): Partial<KbGraphConfig['namespace']> {
  const ns = section(namespace, 'namespace');
  const baseUri = optionalString(ns, 'baseUri', 'namespace');

  if (baseUri !== undefined && !baseUri.includes('://')) {
    throw new ConfigValidationError('config.namespace.baseUri must be an absolute URI');
  }

  return { baseUri };
}

function validateExtractionConfig(extraction: unknown): Partial<KbGraphConfig['extraction']> {
  const ext = section(extraction, 'extraction');
  const names = optionalStringArray(ext, 'extractors', 'extraction');

  let extractors: ExtractorName[] | undefined;
  if (names !== undefined) {
    extractors = [];
    for (const name of names) {
      if (!isOneOf(EXTRACTOR_NAMES, name)) {
        throw new ConfigValidationError(`config.extraction.extractors contains unknown extractor "${name}"`);
      }
      extractors.push(name);
    }
  }

  const dictionaryPath = ext.dictionaryPath;
  if (dictionaryPath !== undefined && dictionaryPath !== null && typeof dictionaryPath !== 'string') {
    throw new ConfigValidationError('config.extraction.dictionaryPath must be a string or null');
  }

  return {
    extractors,
    recognizeEntities: optionalBoolean(ext, 'recognizeEntities', 'extraction'),
    dictionaryPath,
  };
}

function validateOutputConfig(output: unknown): Partial<KbGraphConfig['output']> {
  const out = section(output, 'output');
  const format = out.format;

  if (format !== undefined && !isOneOf(GRAPH_FORMATS, format)) {
    throw new ConfigValidationError(`config.output.format must be one of ${GRAPH_FORMATS.join(', ')}`);
  }

  return {
    directory: optionalString(out, 'directory', 'output'),
    format,
  };
}

function validateStorageConfig(storage: unknown): Partial<KbGraphConfig['storage']> {
  const stg = section(storage, 'storage');
  return {
    documentsPath: optionalString(stg, 'documentsPath', 'storage'),
  };
}

function validateProcessingConfig(processing: unknown): Partial<KbGraphConfig['processing']> {
  const prc = section(processing, 'processing');
  const maxConcurrent = optionalNumber(prc, 'maxConcurrent', 'processing');
  const documentTimeoutMs = optionalNumber(prc, 'documentTimeoutMs', 'processing');

  if (maxConcurrent !== undefined && (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0)) {
    throw new ConfigValidationError('config.processing.maxConcurrent must be a positive integer');
  }

  if (documentTimeoutMs !== undefined && documentTimeoutMs < 0) {
    throw new ConfigValidationError('config.processing.documentTimeoutMs must be non-negative');
  }

  return { maxConcurrent, documentTimeoutMs };
}
