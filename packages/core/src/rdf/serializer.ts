import { Parser, Store, Writer } from 'n3';
import type { GraphFormat } from '@kb-graph/types';
import { loadVocabulary, vocabularyPrefixes, type Vocabulary } from './vocabulary.js';
import type { DocumentGraph } from './graph-assembler.js';

const N3_FORMATS: Record<GraphFormat, string> = {
  turtle: 'Turtle',
  'n-triples': 'N-Triples',
  'n-quads': 'N-Quads',
  trig: 'TriG',
};

/** File extension per format */
export const GRAPH_FILE_EXTENSIONS: Record<GraphFormat, string> = {
  turtle: '.ttl',
  'n-triples': '.nt',
  'n-quads': '.nq',
  trig: '.trig',
};

/**
 * Write a graph as text. Prefixes are only used by Turtle and TriG.
 */
export function serializeGraph(
  graph: DocumentGraph,
  format: GraphFormat = 'turtle',
  vocabulary: Vocabulary = loadVocabulary()
): Promise<string> {
  const writer = new Writer({ format: N3_FORMATS[format], prefixes: vocabularyPrefixes(vocabulary) });
  writer.addQuads(graph.getQuads(null, null, null, null));

  return new Promise((resolve, reject) => {
    writer.end((error, result) => {
      if (error) {
        reject(error);
      } else {
        resolve(result);
      }
    });
  });
}

export function parseGraph(text: string, format: GraphFormat = 'turtle'): DocumentGraph {
  return new Store(new Parser({ format: N3_FORMATS[format] }).parse(text));
}
