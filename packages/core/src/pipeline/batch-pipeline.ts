/**
 * BatchPipeline
 * Registers every document first, then processes them with bounded
 * concurrency so WikiLinks can resolve forward references.
 */

import { nanoid } from 'nanoid';
import type { EntityRecognizer, ExtractorName, SourceDocument } from '@kb-graph/types';
import { DEFAULT_CONFIG, EXTRACTOR_NAMES } from '@kb-graph/types';
import { IdGenerator } from '../identity/id-generator.js';
import { DocumentRegistry } from '../registry/document-registry.js';
import { createExtractors } from '../extractors/index.js';
import { Processor, type ProcessedDocument } from '../processor/processor.js';
import { GraphAssembler, type DocumentGraph } from '../rdf/graph-assembler.js';

export class DocumentTimeoutError extends Error {
  constructor(
    public readonly path: string,
    public readonly timeoutMs: number
  ) {
    super(`Processing ${path} timed out after ${timeoutMs}ms`);
    this.name = 'DocumentTimeoutError';
  }
}

export interface BatchPipelineOptions {
  idGenerator?: IdGenerator;
  recognizer?: EntityRecognizer | null;
  /** Extractors to run (default: all) */
  extractors?: readonly ExtractorName[];
  assembler?: GraphAssembler;
  clock?: () => Date;
  /** Documents processed at the same time (default: 4) */
  maxConcurrent?: number;
  /** Per-document timeout in ms; 0 disables it */
  documentTimeoutMs?: number;
}

export interface BatchResult {
  processed: ProcessedDocument;
  graph: DocumentGraph;
}

export interface BatchError {
  path: string;
  message: string;
}

export interface BatchReport {
  runId: string;
  total: number;
  succeeded: number;
  failed: number;
  errors: BatchError[];
  /** Successful documents in input order */
  results: BatchResult[];
}

function withTimeout<T>(work: Promise<T>, path: string, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new DocumentTimeoutError(path, timeoutMs)), timeoutMs);
  });

  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export class BatchPipeline {
  private ids: IdGenerator;
  private recognizer: EntityRecognizer | null;
  private extractorNames: readonly ExtractorName[];
  private assembler: GraphAssembler;
  private clock: () => Date;
  private maxConcurrent: number;
  private documentTimeoutMs: number;

  constructor(options: BatchPipelineOptions = {}) {
    this.ids = options.idGenerator ?? new IdGenerator();
    this.recognizer = options.recognizer ?? null;
    this.extractorNames = options.extractors ?? EXTRACTOR_NAMES;
    this.assembler = options.assembler ?? new GraphAssembler({ baseUri: this.ids.baseUri });
    this.clock = options.clock ?? (() => new Date());
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_CONFIG.processing.maxConcurrent);
    this.documentTimeoutMs = options.documentTimeoutMs ?? DEFAULT_CONFIG.processing.documentTimeoutMs;
  }

  async run(documents: SourceDocument[]): Promise<BatchReport> {
    const runId = nanoid();
    const startTime = Date.now();
    console.log(`[BatchPipeline] Run ${runId}: ${documents.length} documents (maxConcurrent: ${this.maxConcurrent})`);

    // Phase 1: every identity is known before any link is resolved
    const registry = new DocumentRegistry();
    for (const document of documents) {
      registry.register(this.ids.createDocumentIdentity(document.path));
    }
    registry.seal();

    // Phase 2
    const processor = new Processor({
      idGenerator: this.ids,
      extractors: createExtractors(this.extractorNames, { registry }),
      recognizer: this.recognizer,
      clock: this.clock,
    });

    const slots: (BatchResult | null)[] = new Array<BatchResult | null>(documents.length).fill(null);
    const errors: BatchError[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < documents.length) {
        const index = next++;
        const document = documents[index];
        try {
          slots[index] = await withTimeout(this.processOne(processor, document), document.path, this.documentTimeoutMs);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[BatchPipeline] Failed: ${document.path}: ${message}`);
          errors.push({ path: document.path, message });
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.maxConcurrent, documents.length) }, () => worker());
    await Promise.all(workers);

    const results = slots.filter((slot): slot is BatchResult => slot !== null);
    const duration = Date.now() - startTime;
    console.log(
      `[BatchPipeline] Run ${runId} completed: ${results.length} succeeded, ${errors.length} failed in ${duration}ms`
    );

    return {
      runId,
      total: documents.length,
      succeeded: results.length,
      failed: errors.length,
      errors,
      results,
    };
  }

  private async processOne(processor: Processor, document: SourceDocument): Promise<BatchResult> {
    const processed = await processor.process(document);
    return { processed, graph: this.assembler.assemble(processed.entities) };
  }
}
