// Import config types and re-export them
import { ConfigSchema } from "../config.js";
import type { Config } from "../config.js";
export { ConfigSchema };
export type { Config };

export * from "./table.js";
export * from "./metric.js";
export * from "./report.js";
export * from "./schema.js";
