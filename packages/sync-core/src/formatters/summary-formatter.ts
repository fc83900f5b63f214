/**
 * Run Summary Formatter
 *
 * Formats blueprint results as plain text for the CLI.
 */

import type { BlueprintResult } from '@catalogsync/core';

export interface RunTotals {
  blueprints: number;
  done: number;
  failed: number;
  cancelled: number;
  rowsWritten: number;
  rowsFailed: number;
  rowsSkipped: number;
}

export function summarizeResults(results: readonly BlueprintResult[]): RunTotals {
  return results.reduce<RunTotals>(
    (totals, result) => ({
      blueprints: totals.blueprints + 1,
      done: totals.done + (result.finalState === 'DONE' ? 1 : 0),
      failed: totals.failed + (result.finalState === 'FAILED' ? 1 : 0),
      cancelled: totals.cancelled + (result.finalState === 'CANCELLED' ? 1 : 0),
      rowsWritten: totals.rowsWritten + result.rowsWritten,
      rowsFailed: totals.rowsFailed + result.rowsFailed,
      rowsSkipped: totals.rowsSkipped + result.rowsSkipped,
    }),
    { blueprints: 0, done: 0, failed: 0, cancelled: 0, rowsWritten: 0, rowsFailed: 0, rowsSkipped: 0 }
  );
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m${Math.round(seconds - minutes * 60)}s`;
}

/**
 * One line per blueprint, indented error/warning lines, then totals
 */
export function formatRunSummary(results: readonly BlueprintResult[]): string {
  const lines: string[] = [];

  lines.push('## Export Summary');
  for (const result of results) {
    const state =
      result.finalState === 'FAILED' && result.failedState
        ? `FAILED at ${result.failedState}`
        : result.finalState;
    lines.push(
      `- ${result.blueprintId} -> ${result.table}: ${state} ` +
        `(written ${result.rowsWritten}, failed ${result.rowsFailed}, ` +
        `skipped ${result.rowsSkipped}, ${formatDuration(result.durationMs)})`
    );
    if (result.error) {
      lines.push(result.errorCode ? `  error [${result.errorCode}]: ${result.error}` : `  error: ${result.error}`);
    }
    if (result.suggestion) {
      lines.push(`  suggestion: ${result.suggestion}`);
    }
    for (const warning of result.warnings) {
      lines.push(`  warning: ${warning}`);
    }
  }

  const totals = summarizeResults(results);
  lines.push('');
  lines.push(
    `Blueprints: ${totals.blueprints} (done ${totals.done}, failed ${totals.failed}, cancelled ${totals.cancelled})`
  );
  lines.push(
    `Rows: written ${totals.rowsWritten}, failed ${totals.rowsFailed}, skipped ${totals.rowsSkipped}`
  );

  return lines.join('\n');
}
