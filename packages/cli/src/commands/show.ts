/**
 * show command
 * Prints a stored document record
 */

import * as path from 'path';
import { IdGenerator } from '@kb-graph/core';
import { FileStorage } from '@kb-graph/storage';
import { ConfigLoader } from '@kb-graph/types';
import { formatRecordAsJson, formatRecordAsText } from '../utils/output.js';

export interface ShowCommandOptions {
  format?: 'text' | 'json';
  config?: string;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
}

export async function executeShow(documentPath: string, options: ShowCommandOptions = {}): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const { config, projectRoot } = await ConfigLoader.resolve({ configPath: options.config, cwd });

  const storage = new FileStorage({ basePath: path.resolve(projectRoot, config.storage.documentsPath) });
  const documentId = new IdGenerator(config.namespace.baseUri).generateDocumentId(documentPath);
  const record = await storage.get(documentId);

  if (!record) {
    throw new Error(`Document not found: ${documentPath}\nRun: kb-graph process --store`);
  }

  console.log(options.format === 'json' ? formatRecordAsJson(record) : formatRecordAsText(record));
}
