import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import ignore from 'ignore';
import type { FilesConfig, SourceDocument } from '@kb-graph/types';

// ignore is CommonJS; its factory is reachable as `.default` from ESM
type IgnoreFilter = ReturnType<typeof ignore.default>;

export interface FileDiscoveryOptions {
  /** Knowledge-base root */
  rootDir: string;
  config: FilesConfig;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * `**\/pattern` also matches at the root, as it does in fast-glob
 */
function matchesAny(filePath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => {
    if (pattern.startsWith('**/')) {
      return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
    }
    return minimatch(filePath, pattern);
  });
}

/**
 * Finds Markdown files under the root using glob patterns and .gitignore
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  private ignoreFilter: IgnoreFilter | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * @returns Paths relative to the root, sorted
   */
  async findFiles(): Promise<string[]> {
    if (this.config.ignoreGitignore) {
      await this.loadGitignore();
    }

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false,
      onlyFiles: true,
      dot: false,
    });

    const filter = this.ignoreFilter;
    const kept = filter ? files.filter((file) => !filter.ignores(file)) : files;
    return kept.sort();
  }

  /**
   * Read every discovered file as a source document
   */
  async loadDocuments(): Promise<SourceDocument[]> {
    const files = await this.findFiles();
    return Promise.all(
      files.map(async (file) => ({
        path: file,
        content: await fs.readFile(path.join(this.rootDir, file), 'utf-8'),
      }))
    );
  }

  matchesPattern(filePath: string): boolean {
    return matchesAny(filePath, this.config.include) && !matchesAny(filePath, this.config.exclude);
  }

  shouldIgnore(filePath: string): boolean {
    if (this.config.ignoreGitignore && this.ignoreFilter?.ignores(filePath)) {
      return true;
    }
    return !this.matchesPattern(filePath);
  }

  private async loadGitignore(): Promise<void> {
    try {
      const content = await fs.readFile(path.join(this.rootDir, '.gitignore'), 'utf-8');
      this.ignoreFilter = ignore.default().add(content);
    } catch (error) {
      // no .gitignore
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
  }
}
