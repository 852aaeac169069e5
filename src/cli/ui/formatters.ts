/**
 * Table and summary formatters
 */

import color from "picocolors";

export const TABLE_WIDTHS = {
  database: 16,
  created: 19,
  size: 10,
  artifact: 48,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Quote a CSV field when it contains a separator, quote or newline
 */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
