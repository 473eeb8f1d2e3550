import type { DispatcherStats } from '../dispatcher/types.js';

function formatPercent(part: number, total: number): string {
  const ratio = total > 0 ? (part / total) * 100 : 0;
  return `${ratio.toFixed(1)}%`;
}

export function renderStatsSummary(stats: DispatcherStats): string {
  const total = stats.totalSubmitted;
  const lines = [
    'Dispatcher statistics:',
    `   Submitted: ${total}`,
    `   Succeeded: ${stats.totalSucceeded} (${formatPercent(stats.totalSucceeded, total)})`,
    `   Failed: ${stats.totalFailed} (${formatPercent(stats.totalFailed, total)})`,
    `   Timed out: ${stats.totalTimedOut} (${formatPercent(stats.totalTimedOut, total)})`,
    `   Rejected: ${stats.totalRejected} (${formatPercent(stats.totalRejected, total)})`,
    `   Aborted during shutdown: ${stats.totalAborted}`,
    `   Average latency: ${stats.avgLatencyMs.toFixed(1)}ms`,
  ];
  return `${lines.join('\n')}\n`;
}
