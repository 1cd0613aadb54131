import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const VOCABULARY_ENV_VAR = 'KB_VOCABULARY_NAMESPACE';
export const DEFAULT_VOCABULARY_NAMESPACE = 'http://example.org/kb/vocab#';

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const SCHEMA_NS = 'https://schema.org/';

const VERSION_FILE = fileURLToPath(new URL('../../vocabulary/VERSION.json', import.meta.url));

const VocabularyMetadataSchema = z.object({
  namespace: z.string().min(1),
  version: z.string(),
  classes: z.array(z.string()).optional(),
});

export interface Vocabulary {
  namespace: string;
  version: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Read the `kb` namespace from vocabulary/VERSION.json.
 * `KB_VOCABULARY_NAMESPACE` overrides it; a missing file gives the default.
 */
export function loadVocabulary(
  env: NodeJS.ProcessEnv = process.env,
  versionFile: string = VERSION_FILE
): Vocabulary {
  let vocabulary: Vocabulary = { namespace: DEFAULT_VOCABULARY_NAMESPACE, version: 'unknown' };

  try {
    const metadata = VocabularyMetadataSchema.parse(JSON.parse(readFileSync(versionFile, 'utf-8')));
    vocabulary = { namespace: metadata.namespace, version: metadata.version };
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }

  const override = env[VOCABULARY_ENV_VAR];
  return override ? { ...vocabulary, namespace: override } : vocabulary;
}

export function vocabularyPrefixes(vocabulary: Vocabulary): Record<string, string> {
  return {
    kb: vocabulary.namespace,
    schema: SCHEMA_NS,
    rdf: RDF_NS,
    rdfs: RDFS_NS,
    xsd: XSD_NS,
  };
}
