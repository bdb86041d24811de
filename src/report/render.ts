import type { MetricResult } from "../types/metric.js";
import type { LedgerRow, ReportSummary } from "../types/report.js";
import { formatValue, truncate } from "../utils/functions.js";

export const DEFAULT_MAX_COLUMN_WIDTH = 40;

const LEDGER_COLUMNS = ["table_name", "metric", "limits", "values", "status", "error"] as const;

export function formatResult(values: MetricResult | null): string {
  if (values === null) return "";
  const entries = Object.entries(values).map(([key, value]) => `${key}: ${formatValue(value)}`);
  return `{${entries.join(", ")}}`;
}

function ledgerCells(row: LedgerRow): string[] {
  return [row.tableName, row.metric, row.limits, formatResult(row.values), row.status, row.error];
}

/**
 * Fixed-width text table of the ledger with a leading row index
 */
export function renderLedger(ledger: readonly LedgerRow[], maxColumnWidth: number = DEFAULT_MAX_COLUMN_WIDTH): string {
  const header = ["", ...LEDGER_COLUMNS];
  const body = ledger.map((row, index) => [
    String(index),
    ...ledgerCells(row).map(cell => truncate(cell.replace(/\s+/g, " "), maxColumnWidth)),
  ]);
  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map(cells => (cells[column] ?? "").length))
  );
  return [header, ...body]
    .map(cells => cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join("  ").trimEnd())
    .join("\n");
}

/**
 * Title, ledger, per-status counts and total, separated by blank lines
 */
export function renderReport(summary: ReportSummary, maxColumnWidth: number = DEFAULT_MAX_COLUMN_WIDTH): string {
  return (
    `${summary.title}\n\n` +
    `${renderLedger(summary.ledger, maxColumnWidth)}\n\n` +
    `Passed: ${summary.passed} (${summary.passedPct}%)\n` +
    `Failed: ${summary.failed} (${summary.failedPct}%)\n` +
    `Errors: ${summary.errors} (${summary.errorsPct}%)\n` +
    "\n" +
    `Total: ${summary.total}`
  );
}
