/**
 * Output formatting
 */

import type { BatchReport } from '@kb-graph/core';
import type { DocumentRecord } from '@kb-graph/types';

export function formatProcessSummary(report: BatchReport, outputDir: string): string {
  const lines: string[] = [];
  lines.push(`Processed ${report.total} documents (run ${report.runId})`);
  lines.push(`  Succeeded: ${report.succeeded}`);
  lines.push(`  Failed: ${report.failed}`);

  const warnings = report.results.reduce((count, result) => count + result.processed.warnings.length, 0);
  if (warnings > 0) {
    lines.push(`  Warnings: ${warnings}`);
  }

  const statements = report.results.reduce((count, result) => count + result.graph.size, 0);
  lines.push(`  Statements: ${statements}`);
  lines.push(`  Output: ${outputDir}`);

  for (const error of report.errors) {
    lines.push(`  ! ${error.path}: ${error.message}`);
  }

  return lines.join('\n');
}

export function formatRecordAsJson(record: DocumentRecord): string {
  return JSON.stringify(record, null, 2);
}

/**
 * Short human-readable view of a stored document
 */
export function formatRecordAsText(record: DocumentRecord): string {
  const lines: string[] = [];
  lines.push(`${record.title} (${record.path})`);
  lines.push(`  Id: ${record.documentId}`);
  lines.push(`  Updated: ${record.metadata.updatedAt.toISOString()}`);
  if (record.frontmatter?.author) {
    lines.push(`  Author: ${record.frontmatter.author}`);
  }
  if (record.frontmatter?.description) {
    lines.push(`  Description: ${record.frontmatter.description}`);
  }

  if (record.tags.length > 0) {
    const tags = record.tags.map((tag) => (tag.category ? `${tag.category}/${tag.name}` : tag.name));
    lines.push(`  Tags: ${tags.join(', ')}`);
  }

  if (record.links.length > 0) {
    lines.push('  Links:');
    for (const link of record.links) {
      lines.push(`    - ${link.text || link.url} -> ${link.url}${link.internal ? ' (internal)' : ''}`);
    }
  }

  if (record.wikilinks.length > 0) {
    lines.push('  WikiLinks:');
    for (const link of record.wikilinks) {
      lines.push(`    - ${link.originalText} -> ${link.resolvedDocumentUri ?? '(unresolved)'}`);
    }
  }

  if (record.entities.length > 0) {
    lines.push('  Entities:');
    for (const entity of record.entities) {
      lines.push(`    - ${entity.text} [${entity.label}]`);
    }
  }

  return lines.join('\n');
}
