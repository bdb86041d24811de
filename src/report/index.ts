import { describeLimits, describeMetric, evaluateMetric } from "../metrics/index.js";
import { DEFAULT_PARTITIONS, isTable, toDistributedTable, toLocalTable } from "../tables/index.js";
import type { Table } from "../tables/index.js";
import type { MetricResult } from "../types/metric.js";
import { ENGINES } from "../types/report.js";
import type { CheckEntry, CheckStatus, Engine, LedgerRow, LimitSpec, ReportSummary } from "../types/report.js";
import {
  EmptyChecklistError,
  NotFittedError,
  TableNotFoundError,
  UnknownEngineError,
  UnsupportedTableKindError,
} from "../utils/errors.js";
import { roundTo } from "../utils/functions.js";
import { hasProperty, isValidNumber } from "../utils/typeguards.js";
import { DEFAULT_MAX_COLUMN_WIDTH, renderReport } from "./render.js";

export { renderLedger, renderReport, formatResult, DEFAULT_MAX_COLUMN_WIDTH } from "./render.js";

/**
 * Tables a checklist can refer to, keyed by name
 */
export type TableRegistry = Map<string, Table> | Readonly<Record<string, Table>>;

export interface ReportOptions {
  /** Report heading; defaults to the sorted table names */
  title?: string;
  /** Run every check on this backend, converting tables as needed */
  engine?: Engine;
  /** Partition count for tables converted to the distributed engine */
  partitions?: number;
  /** Clock for date-lag checks */
  now?: () => Date;
  /** Don't log errored checks to stderr */
  suppressConsole?: boolean;
  maxColumnWidth?: number;
}

function tableNames(tables: TableRegistry): string[] {
  return tables instanceof Map ? [...tables.keys()] : Object.keys(tables);
}

function lookupTable(tables: TableRegistry, name: string): unknown {
  if (tables instanceof Map) return tables.get(name);
  return Object.hasOwn(tables, name) ? tables[name] : undefined;
}

/**
 * `.` when every limited key is present and within its inclusive range,
 * `F` at the first one that is not
 */
export function checkLimits(result: MetricResult, limits: LimitSpec): CheckStatus {
  for (const [key, [lower, upper]] of Object.entries(limits)) {
    const value = result[key];
    if (!isValidNumber(value) || value < lower || value > upper) {
      return "F";
    }
  }
  return ".";
}

function percent(count: number, total: number): number {
  return roundTo((count * 100) / total, 2);
}

/**
 * Data-quality report over a checklist of `(table, metric, limits)` entries.
 *
 * `fit` evaluates every entry in order. A missing table or a failing metric
 * marks its entry `E` and the remaining entries still run; a value that is not
 * a table aborts the whole fit. Fitting again replaces the previous state.
 */
export class Report {
  readonly checklist: readonly CheckEntry[];
  private state: ReportSummary | undefined;
  private readonly engine: Engine | undefined;

  constructor(
    checklist: readonly CheckEntry[],
    private readonly options: ReportOptions = {}
  ) {
    if (checklist.length === 0) {
      throw new EmptyChecklistError();
    }
    this.checklist = Object.freeze([...checklist]);
    const engine = options.engine;
    if (engine !== undefined && !ENGINES.some(known => known === engine)) {
      throw new UnknownEngineError(String(engine));
    }
    this.engine = engine;
  }

  get isFitted(): boolean {
    return this.state !== undefined;
  }

  /**
   * The fitted state
   *
   * @throws NotFittedError before `fit`
   */
  get summary(): ReportSummary {
    if (!this.state) {
      throw new NotFittedError();
    }
    return this.state;
  }

  private prepare(table: Table): Table {
    switch (this.engine) {
      case "local":
        return toLocalTable(table);
      case "distributed":
        return toDistributedTable(table, this.options.partitions ?? DEFAULT_PARTITIONS);
      default:
        return table;
    }
  }

  private resolve(tables: TableRegistry, name: string): Table {
    const table = lookupTable(tables, name);
    if (table === undefined) {
      throw new TableNotFoundError(name, tableNames(tables));
    }
    if (!isTable(table)) {
      throw new UnsupportedTableKindError(
        hasProperty(table, "kind") ? String(table.kind) : typeof table
      );
    }
    return this.prepare(table);
  }

  /**
   * Calculate every check and build the report
   */
  fit(tables: TableRegistry): ReportSummary {
    this.state = undefined;
    const context = { now: this.options.now ?? (() => new Date()) };
    const ledger: LedgerRow[] = [];
    let passed = 0;
    let failed = 0;
    let errors = 0;

    this.checklist.forEach((entry, index) => {
      const base = {
        tableName: entry.table,
        metric: describeMetric(entry.metric),
        limits: describeLimits(entry.limits),
      };
      try {
        const table = this.resolve(tables, entry.table);
        const values = evaluateMetric(entry.metric, table, context);
        const status = checkLimits(values, entry.limits);
        ledger.push({ ...base, values, status, error: "" });
        if (status === ".") {
          passed += 1;
        } else {
          failed += 1;
        }
      } catch (error) {
        if (error instanceof UnsupportedTableKindError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        if (!this.options.suppressConsole) {
          console.error(`Check ${index} (${base.metric} on '${entry.table}') errored: ${message}`);
        }
        ledger.push({ ...base, values: null, status: "E", error: message });
        errors += 1;
      }
    });

    const total = ledger.length;
    this.state = {
      title: this.options.title ?? `DQ Report for tables [${tableNames(tables).sort().join(", ")}]`,
      ledger,
      passed,
      failed,
      errors,
      total,
      passedPct: percent(passed, total),
      failedPct: percent(failed, total),
      errorsPct: percent(errors, total),
    };
    return this.state;
  }

  /**
   * Text form of the fitted report
   *
   * @throws NotFittedError before `fit`
   */
  render(): string {
    return renderReport(this.summary, this.options.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH);
  }
}
