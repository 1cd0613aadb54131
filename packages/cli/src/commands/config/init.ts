/**
 * config init command
 * Writes a .kb-graph.json with the default settings
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { KbGraphConfig } from '@kb-graph/types';
import { ConfigLoader } from '@kb-graph/types';

export interface ConfigInitOptions {
  /** Project root (default: cwd) */
  projectRoot?: string;
  /** Namespace for generated identifiers */
  baseUri?: string;
  /** Overwrite an existing file */
  force?: boolean;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function createDefaultConfig(options: { projectRoot: string; baseUri?: string }): KbGraphConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.project.name = path.basename(options.projectRoot);
  if (options.baseUri) {
    config.namespace.baseUri = options.baseUri;
  }
  return config;
}

export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const projectRoot = options.projectRoot || cwd;
  const configPath = path.join(cwd, '.kb-graph.json');

  console.log('Initializing kb-graph configuration...\n');

  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('Overwriting existing configuration file...\n');
  } catch (error) {
    // a missing file is the normal case
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }

  const config = createDefaultConfig({ projectRoot, baseUri: options.baseUri });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log('Configuration file created.\n');
  console.log(`File: ${configPath}`);
  console.log(`Project: ${config.project.name}`);
  console.log(`Namespace: ${config.namespace.baseUri}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .kb-graph.json');
  console.log('  2. Build the graph: kb-graph process');
  console.log('  3. Inspect a document: kb-graph show <path>\n');

  return configPath;
}
