import { Interval } from '../../domain/types/interval.type';

export interface SelectionSummary {
  totalCost: number;
  selectedCount: number;
}

export interface SelectionReport extends SelectionSummary {
  selected: Interval[];
  score: number;
}

export function summarizeSelection(
  selected: readonly Interval[],
): SelectionSummary {
  return {
    totalCost: selected.reduce((sum, interval) => sum + interval.cost, 0),
    selectedCount: selected.length,
  };
}

export function formatInterval(interval: Interval): string {
  return `(${interval.start}, ${interval.end}, ${interval.cost})`;
}

/**
 * Plain-text report: the selection one interval per line, then score, total
 * cost and count, each block separated by a blank line.
 */
export function renderReport(report: SelectionReport): string {
  const lines = [
    '',
    'Optimal set of intervals:',
    ...report.selected.map(formatInterval),
    '',
    `Maximum Score: ${report.score}`,
    '',
    `Total Cost Score: ${report.totalCost}`,
    '',
    `Count Intervals: ${report.selectedCount}`,
  ];

  return `${lines.join('\n')}\n`;
}
