/**
 * Run summary for the terminal
 *
 * @module app/report
 */

import { describeOrigin } from '../models/source-item.js';
import type { RunSummary } from '../services/pipeline/orchestrator.js';

export function formatRunSummary(summary: RunSummary): string[] {
  const lines: string[] = [];

  for (const report of summary.sources) {
    const label = describeOrigin(report.origin);
    if (report.status === 'skipped') {
      lines.push(`SKIP    ${label} (already processed)`);
    } else if (report.status === 'failed') {
      lines.push(`FAILED  ${report.title ?? label} [${report.category}] ${report.message}`);
    } else {
      const { outcome } = report;
      lines.push(
        `OK      ${report.title}: ${outcome.accepted}/${outcome.generated} cards kept, ` +
          `${outcome.rejected} duplicates` +
          (outcome.exportFailures > 0 ? `, ${outcome.exportFailures} export failures` : '')
      );
      for (const r of report.rejections) {
        lines.push(`          duplicate (${r.similarity.toFixed(2)}): "${r.candidate}" ~ "${r.matched}"`);
      }
    }
  }

  const backend = summary.degradedFrom
    ? `${summary.backend} (fell back from ${summary.degradedFrom})`
    : summary.backend;
  lines.push(
    `Done: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed; ` +
      `${summary.accepted} cards kept, ${summary.rejected} duplicates rejected; signatures: ${backend}`
  );

  const { decisions } = summary;
  const unchecked: string[] = [];
  if (decisions.degenerate > 0) unchecked.push(`${decisions.degenerate} without comparable text`);
  if (decisions.forced > 0) unchecked.push(`${decisions.forced} with duplicates allowed`);
  lines.push(
    `Decisions: ${decisions.accepted} accepted` +
      (unchecked.length > 0 ? ` (${unchecked.join(', ')})` : '') +
      `, ${decisions.rejected} rejected`
  );
  return lines;
}
