import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { KbGraphConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type KbGraphConfigInput } from './validator.js';

/**
 * Options for config resolution
 */
export interface ResolveConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Walk up parent directories while searching (default: true) */
  traverseUp?: boolean;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Fail when no config file is found (default: false) */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: KbGraphConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * Config file names, in priority order
 */
const CONFIG_FILE_NAMES = ['.kb-graph.json', 'kb-graph.json'] as const;

/** Environment variable naming a config file */
export const CONFIG_ENV_VAR = 'KB_GRAPH_CONFIG';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ConfigLoader {
  /**
   * Load a config file and merge it over the defaults.
   * A missing file yields the defaults.
   */
  static async load(configPath: string = './.kb-graph.json'): Promise<KbGraphConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * Locate the config file, decide the project root and load the config
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: kb-graph config init'
      );
    }

    if (!configPath) {
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    const config = await this.load(configPath);
    const configDir = path.dirname(configPath);

    // project.root is relative to the config file
    const projectRoot = config.project.root && config.project.root !== DEFAULT_CONFIG.project.root
      ? await this.normalizeProjectRoot(path.resolve(configDir, config.project.root))
      : await this.getProjectRootFromConfig(configPath);

    return { config, configPath, projectRoot };
  }

  /**
   * A fresh copy of the default config
   */
  static getDefaultConfig(): KbGraphConfig {
    return this.mergeWithDefaults({});
  }

  private static async findConfigFile(
    startDir: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * Explicit path, then the environment variable, then a directory search
   */
  private static async resolveConfigPath(
    explicitPath?: string,
    cwd: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * Absolute, symlinks resolved, no trailing slash
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return absolutePath.replace(/\/$/, '');
      }
      throw error;
    }
  }

  private static async getProjectRootFromConfig(configPath: string): Promise<string> {
    const configDir = path.dirname(path.resolve(configPath));
    return await this.normalizeProjectRoot(configDir);
  }

  private static mergeWithDefaults(config: KbGraphConfigInput): KbGraphConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: [...(config.files?.include ?? DEFAULT_CONFIG.files.include)],
        exclude: [...(config.files?.exclude ?? DEFAULT_CONFIG.files.exclude)],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      namespace: {
        baseUri: config.namespace?.baseUri ?? DEFAULT_CONFIG.namespace.baseUri,
      },
      extraction: {
        extractors: [...(config.extraction?.extractors ?? DEFAULT_CONFIG.extraction.extractors)],
        recognizeEntities:
          config.extraction?.recognizeEntities ?? DEFAULT_CONFIG.extraction.recognizeEntities,
        dictionaryPath:
          config.extraction?.dictionaryPath !== undefined
            ? config.extraction.dictionaryPath
            : DEFAULT_CONFIG.extraction.dictionaryPath,
      },
      output: {
        directory: config.output?.directory ?? DEFAULT_CONFIG.output.directory,
        format: config.output?.format ?? DEFAULT_CONFIG.output.format,
      },
      storage: {
        documentsPath: config.storage?.documentsPath ?? DEFAULT_CONFIG.storage.documentsPath,
      },
      processing: {
        maxConcurrent: config.processing?.maxConcurrent ?? DEFAULT_CONFIG.processing.maxConcurrent,
        documentTimeoutMs:
          config.processing?.documentTimeoutMs ?? DEFAULT_CONFIG.processing.documentTimeoutMs,
      },
    };
  }
}
