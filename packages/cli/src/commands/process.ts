/**
 * process command
 * Discovers Markdown files, builds their graphs and writes them out
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  BatchPipeline,
  DictionaryRecognizer,
  FileDiscovery,
  GRAPH_FILE_EXTENSIONS,
  IdGenerator,
  NullRecognizer,
  serializeGraph,
  stripExtension,
  type BatchReport,
} from '@kb-graph/core';
import { FileStorage } from '@kb-graph/storage';
import { ConfigLoader, GRAPH_FORMATS } from '@kb-graph/types';
import type { EntityRecognizer, ExtractionConfig, GraphFormat } from '@kb-graph/types';
import { formatProcessSummary } from '../utils/output.js';

export interface ProcessCommandOptions {
  /** Output directory (default: output.directory from the config) */
  out?: string;
  format?: string;
  /** Persist document records */
  store?: boolean;
  config?: string;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
}

function parseFormat(value: string | undefined, fallback: GraphFormat): GraphFormat {
  if (value === undefined) {
    return fallback;
  }
  const format = GRAPH_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new Error(`Unknown format "${value}" (expected one of ${GRAPH_FORMATS.join(', ')})`);
  }
  return format;
}

async function createRecognizer(
  extraction: ExtractionConfig,
  projectRoot: string
): Promise<EntityRecognizer | null> {
  if (!extraction.recognizeEntities) {
    return null;
  }
  if (!extraction.dictionaryPath) {
    return new NullRecognizer();
  }
  return DictionaryRecognizer.fromFile(path.resolve(projectRoot, extraction.dictionaryPath));
}

export async function executeProcess(root: string | undefined, options: ProcessCommandOptions = {}): Promise<BatchReport> {
  const cwd = options.cwd ?? process.cwd();
  const { config, projectRoot } = await ConfigLoader.resolve({ configPath: options.config, cwd });

  const rootDir = root ? path.resolve(cwd, root) : projectRoot;
  const format = parseFormat(options.format, config.output.format);
  const outputDir = options.out ? path.resolve(cwd, options.out) : path.resolve(projectRoot, config.output.directory);

  const discovery = new FileDiscovery({ rootDir, config: config.files });
  const documents = await discovery.loadDocuments();
  console.log(`Found ${documents.length} documents in ${rootDir}`);

  const pipeline = new BatchPipeline({
    idGenerator: new IdGenerator(config.namespace.baseUri),
    recognizer: await createRecognizer(config.extraction, projectRoot),
    extractors: config.extraction.extractors,
    maxConcurrent: config.processing.maxConcurrent,
    documentTimeoutMs: config.processing.documentTimeoutMs,
  });
  const report = await pipeline.run(documents);

  for (const result of report.results) {
    const target = path.join(outputDir, stripExtension(result.processed.identity.path) + GRAPH_FILE_EXTENSIONS[format]);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await serializeGraph(result.graph, format), 'utf-8');
  }

  if (options.store) {
    const storage = new FileStorage({ basePath: path.resolve(projectRoot, config.storage.documentsPath) });
    for (const result of report.results) {
      await storage.save(result.processed.record);
    }
    console.log(`Stored ${report.results.length} document records`);
  }

  console.log(formatProcessSummary(report, outputDir));
  return report;
}
