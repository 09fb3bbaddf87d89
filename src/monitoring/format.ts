import { formatDateTime } from '../logger.js';
import type { OperationStats, StatusSnapshot } from './types.js';

/**
 * Formats one operation as `<name>: <rate>/hour (<count> total)`.
 */
export function formatOperationLine(name: string, stats: OperationStats): string {
  return `${name}: ${stats.rate_per_hour.toFixed(1)}/hour (${stats.count} total)`;
}

/**
 * Operation lines sorted by name.
 */
export function formatOperationLines(operations: Record<string, OperationStats>): string[] {
  return Object.keys(operations)
    .sort()
    .map((name) => formatOperationLine(name, operations[name]));
}

/**
 * Renders a snapshot as the human-readable `.stats` file.
 */
export function formatStatus(status: StatusSnapshot): string {
  const lines: string[] = [
    `Worker ID: ${status.worker_id}`,
    `Status: ${status.status}`,
    `Total Cycles: ${status.total_work_cycles}`,
  ];

  if (status.last_work_cycle_time) {
    lines.push(`Last Cycle Duration: ${status.last_work_cycle_time.toFixed(2)}s`);
  }

  if (status.total_processing_time) {
    const average = status.total_processing_time / Math.max(1, status.total_work_cycles);
    lines.push(`Average Cycle Time: ${average.toFixed(2)}s`);
  }

  const operationLines = formatOperationLines(status.operations);
  if (operationLines.length > 0) {
    lines.push('\nOperations:');
    lines.push(...operationLines.map((line) => `  ${line}`));
  }

  if (status.timestamp) {
    lines.push(`\nLast Updated: ${formatDateTime(new Date(status.timestamp * 1000))}`);
  }

  return lines.join('\n');
}

/**
 * Formats a duration in seconds: `12.3s`, `2m 5s` or `1h 2m 3s`.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    return `${minutes}m ${Math.round(seconds % 60)}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m ${Math.round(seconds % 60)}s`;
}
