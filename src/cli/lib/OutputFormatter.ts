/**
 * Output Formatter
 *
 * Consistent output formatting for the deploy CLI: colored status labels and
 * a plain ASCII results table.
 */

import chalk from 'chalk';
import { DeployStatus } from '../../deploy/types.js';
import type { DeployResult } from '../../deploy/types.js';
import type { ComponentLevelInfo } from '../../logging/index.js';

type ChalkFn = (text: string) => string;

// =============================================================================
// Color Helpers
// =============================================================================

export function getStatusColor(status: DeployStatus): ChalkFn {
  switch (status) {
    case DeployStatus.SUCCESS:
      return chalk.green;
    case DeployStatus.SKIPPED:
      return chalk.yellow;
    case DeployStatus.FAILED:
      return chalk.red;
    case DeployStatus.QUEUED:
      return chalk.cyan;
  }
}

export function statusLabel(status: DeployStatus): string {
  switch (status) {
    case DeployStatus.SUCCESS:
      return 'SUCCESS';
    case DeployStatus.SKIPPED:
      return 'SKIPPED';
    case DeployStatus.FAILED:
      return 'FAILED';
    case DeployStatus.QUEUED:
      return 'QUEUED';
  }
}

// =============================================================================
// Format Helpers
// =============================================================================

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

// =============================================================================
// Table Formatting
// =============================================================================

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
  /** Applied after padding so escape codes do not disturb alignment */
  color?: (cell: string) => ChalkFn | undefined;
}

/**
 * Create a simple bordered ASCII table
 */
export function createTable(data: string[][], columns: TableColumn[]): string {
  const widths = columns.map((col, i) =>
    Math.max(col.width, col.header.length, ...data.map((row) => (row[i] ?? '').length))
  );
  const rule = (left: string, mid: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;

  const lines: string[] = [rule('┌', '┬', '┐')];
  lines.push('│' + columns.map((col, i) => ` ${pad(col.header, widths[i] ?? 0, col.align)} `).join('│') + '│');
  lines.push(rule('├', '┼', '┤'));
  for (const row of data) {
    const cells = columns.map((col, i) => {
      const raw = row[i] ?? '';
      const padded = pad(raw, widths[i] ?? 0, col.align);
      const color = col.color?.(raw);
      return ` ${color ? color(padded) : padded} `;
    });
    lines.push('│' + cells.join('│') + '│');
  }
  lines.push(rule('└', '┴', '┘'));

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

const STATUS_BY_LABEL = new Map<string, DeployStatus>(
  [DeployStatus.SUCCESS, DeployStatus.SKIPPED, DeployStatus.FAILED, DeployStatus.QUEUED].map((s) => [statusLabel(s), s])
);

/**
 * Format deploy results as a table
 */
export function formatResultTable(results: readonly DeployResult[]): string {
  const columns: TableColumn[] = [
    { header: 'REPO', width: 24 },
    { header: 'COMMIT', width: 12 },
    {
      header: 'STATUS',
      width: 7,
      color: (cell) => {
        const status = STATUS_BY_LABEL.get(cell);
        return status === undefined ? undefined : getStatusColor(status);
      },
    },
  ];

  const data = results.map((result) => [
    result.identity,
    result.commit === null ? '-' : result.commit.slice(0, 12),
    statusLabel(result.status),
  ]);

  return createTable(data, columns);
}

/**
 * Format registered log components; overridden levels are marked with `*`
 */
export function formatComponentTable(components: readonly ComponentLevelInfo[]): string {
  const columns: TableColumn[] = [
    { header: 'COMPONENT', width: 20 },
    { header: 'LEVEL', width: 6 },
    { header: 'DESCRIPTION', width: 30 },
  ];

  const data = components.map((component) => [
    component.name,
    component.hasOverride ? `${component.effectiveLevel}*` : component.effectiveLevel,
    component.description,
  ]);

  return createTable(data, columns);
}
