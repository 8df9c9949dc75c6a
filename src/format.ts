// Formatting helpers for the console report.

import { RunOutcome, RunRecord } from './types';

export const STATUS_EMOJI: Record<RunOutcome['status'], string> = {
  success: '✅',
  timeout: '⏱️',
  'tool-error': '❌',
  'malformed-output': '⚠️'
};

export function percent(value: number | null, digits = 1): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(digits)}%`;
}

export function fixed(value: number | null, digits = 2): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

// Left-aligned columns padded to the widest cell, with a rule under the header.
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
  const line = (cells: string[]) => widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join(' │ ').trimEnd();
  return [line(headers), widths.map(w => '─'.repeat(w)).join('─┼─'), ...rows.map(line)];
}

// Join provided (string | false) parts into a comma separated list; falsy entries are skipped.
export function joinParts(parts: Array<string | false | undefined>): string {
  return parts.filter(Boolean).join(', ');
}

export function outcomeLine(record: RunRecord): string {
  const detail = record.outcome.status === 'success' ? '' : ` - ${record.outcome.message}`;
  return `${STATUS_EMOJI[record.outcome.status]} ${record.toolId} on ${record.repositoryId}: ${record.outcome.status} (${record.durationSeconds.toFixed(1)}s)${detail}`;
}
