/**
 * Library entry point: tables, metrics and reports without the MCP server
 */
export {
  createLocalTable,
  createDistributedTable,
  createTable,
  toLocalTable,
  toDistributedTable,
  isTable,
  LocalTable,
  DistributedTable,
  Column,
  col,
  lit,
  allOf,
  anyOf,
  toTimestamp,
  DEFAULT_PARTITIONS,
} from "./tables/index.js";
export type { Table, TableOptions, DistributedTableOptions, Partition } from "./tables/index.js";

export {
  defineMetric,
  evaluateMetric,
  describeMetric,
  describeLimits,
  METRIC_CATALOG,
} from "./metrics/index.js";
export type { MetricCatalogEntry, MetricParameterInfo } from "./metrics/index.js";

export { Report, checkLimits, renderReport, renderLedger } from "./report/index.js";
export type { ReportOptions, TableRegistry } from "./report/index.js";

export * from "./types/index.js";
export * from "./utils/errors.js";
