import { randomUUID } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { PipelineResult, PipelineStatus, RunReport } from './types.js';

export function buildRunReport(input: {
  results: readonly PipelineResult[];
  startedAt: Date;
  finishedAt?: Date;
  cancelled?: boolean;
  runId?: string;
}): RunReport {
  const counts: Record<PipelineStatus | 'total', number> = {
    total: input.results.length,
    success: 0,
    skipped: 0,
    failed: 0
  };
  for (const result of input.results) {
    counts[result.status]++;
  }

  const failures = input.results
    .filter(result => result.status === 'failed')
    .map(result => Object.freeze({
      topic: result.topic,
      ...(result.sourceRowId ? { sourceRowId: result.sourceRowId } : {}),
      reason: result.reason ?? 'unknown'
    }));

  return Object.freeze({
    runId: input.runId ?? randomUUID(),
    startedAt: input.startedAt,
    finishedAt: input.finishedAt ?? new Date(),
    cancelled: input.cancelled ?? false,
    counts: Object.freeze(counts),
    results: Object.freeze([...input.results]),
    failures: Object.freeze(failures)
  });
}

export function formatRunSummary(report: RunReport): string {
  const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
  const { total, success, skipped, failed } = report.counts;
  const lines = [
    `Run ${report.runId}${report.cancelled ? ' (cancelled)' : ''}: ${total} topics in ${seconds}s - ${success} published, ${skipped} skipped, ${failed} failed`
  ];

  for (const failure of report.failures) {
    const row = failure.sourceRowId ? `[${failure.sourceRowId}] ` : '';
    lines.push(`  - ${row}${failure.topic}: ${failure.reason}`);
  }

  return lines.join('\n');
}

export async function writeRunReport(filePath: string, report: RunReport): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
}

export const EXIT_CODES = {
  clean: 0,
  failures: 1,
  fatal: 2,
  cancelled: 130
} as const;

/** Cancellation takes precedence over failures. */
export function exitCodeFor(report: RunReport): number {
  if (report.cancelled) {
    return EXIT_CODES.cancelled;
  }
  return report.counts.failed > 0 ? EXIT_CODES.failures : EXIT_CODES.clean;
}
