#!/usr/bin/env node
/**
 * kb-graph CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeProcess, type ProcessCommandOptions } from './commands/process.js';
import { executeShow, type ShowCommandOptions } from './commands/show.js';
import { initConfig } from './commands/config/init.js';

// version comes from package.json (one level above both src/ and dist/)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * Set by the preSubcommand hook
 */
let globalConfigPath: string | undefined;

async function runAction(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('kb-graph')
  .description('Build an RDF knowledge graph from Markdown notes')
  .version(version)
  .addOption(
    new Option('-c, --config <path>', 'Configuration file path')
      .env('KB_GRAPH_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// process
program
  .command('process')
  .description('Process Markdown files and write their graphs')
  .argument('[root]', 'Knowledge-base root (default: project root)')
  .option('--out <dir>', 'Output directory')
  .option('--format <format>', 'Graph format (turtle, n-triples, n-quads, trig)')
  .option('--store', 'Persist document records')
  .action((root: string | undefined, options: ProcessCommandOptions) => {
    void runAction(async () => {
      const report = await executeProcess(root, { ...options, config: globalConfigPath });
      if (report.failed > 0) {
        process.exitCode = 1;
      }
    });
  });

// show
program
  .command('show')
  .description('Print a stored document record')
  .argument('<documentPath>', 'Document path relative to the root')
  .option('--format <format>', 'Output format (text, json)', 'text')
  .action((documentPath: string, options: ShowCommandOptions) => {
    void runAction(() => executeShow(documentPath, { ...options, config: globalConfigPath }));
  });

// config
const configCmd = program
  .command('config')
  .description('Configuration management');

configCmd
  .command('init')
  .description('Create a configuration file')
  .option('--base-uri <uri>', 'Namespace for generated identifiers')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { baseUri?: string; force?: boolean }) => {
    void runAction(() => initConfig(options));
  });

program.parse(process.argv);
