import type { Row, Scalar } from "../types/table.js";
import { parseDate } from "../utils/dates.js";
import { MetricEvaluationError } from "../utils/errors.js";
import { isNullish, isValidNumber } from "../utils/typeguards.js";

/**
 * Cell-level operations shared by both backends. Comparisons and arithmetic
 * follow SQL null logic: a null operand gives a null result.
 */

function describe(value: unknown): string {
  return typeof value === "string" ? `'${value}'` : String(value);
}

function requireNumber(value: Scalar, operation: string): number {
  if (!isValidNumber(value)) {
    throw new MetricEvaluationError(
      `Cannot apply ${operation} to non-numeric value ${describe(value)}`
    );
  }
  return value;
}

export function equals(a: Scalar, b: Scalar): boolean | null {
  if (isNullish(a) || isNullish(b)) return null;
  return a === b;
}

export function lessThan(a: Scalar, b: Scalar, strict: boolean): boolean | null {
  if (isNullish(a) || isNullish(b)) return null;
  const operation = strict ? "<" : "<=";
  const left = requireNumber(a, operation);
  const right = requireNumber(b, operation);
  return strict ? left < right : left <= right;
}

/** Division by zero yields null */
export function divide(a: Scalar, b: Scalar): number | null {
  if (isNullish(a) || isNullish(b)) return null;
  const numerator = requireNumber(a, "/");
  const denominator = requireNumber(b, "/");
  if (denominator === 0) return null;
  return numerator / denominator;
}

function and(a: Scalar, b: Scalar): boolean | null {
  if (a === false || b === false) return false;
  if (isNullish(a) || isNullish(b)) return null;
  return true;
}

function or(a: Scalar, b: Scalar): boolean | null {
  if (a === true || b === true) return true;
  if (isNullish(a) || isNullish(b)) return null;
  return false;
}

/**
 * A deferred per-row expression over named columns
 */
export class Column {
  constructor(
    readonly label: string,
    readonly references: readonly string[],
    private readonly compute: (row: Row) => Scalar
  ) {}

  evaluate(row: Row): Scalar {
    return this.compute(row);
  }

  private combine(
    operator: string,
    other: Column | Scalar,
    fn: (a: Scalar, b: Scalar) => Scalar
  ): Column {
    const right = other instanceof Column ? other : lit(other);
    return new Column(
      `(${this.label} ${operator} ${right.label})`,
      [...new Set([...this.references, ...right.references])],
      row => fn(this.evaluate(row), right.evaluate(row))
    );
  }

  eq(other: Column | Scalar): Column {
    return this.combine("=", other, equals);
  }

  lt(other: Column | Scalar): Column {
    return this.combine("<", other, (a, b) => lessThan(a, b, true));
  }

  le(other: Column | Scalar): Column {
    return this.combine("<=", other, (a, b) => lessThan(a, b, false));
  }

  div(other: Column | Scalar): Column {
    return this.combine("/", other, divide);
  }

  and(other: Column | Scalar): Column {
    return this.combine("AND", other, and);
  }

  or(other: Column | Scalar): Column {
    return this.combine("OR", other, or);
  }

  not(): Column {
    return new Column(`NOT ${this.label}`, this.references, row => {
      const value = this.evaluate(row);
      return isNullish(value) ? null : value !== true;
    });
  }

  /** True for null, missing and NaN cells */
  isNull(): Column {
    return new Column(`${this.label} IS NULL`, this.references, row => isNullish(this.evaluate(row)));
  }

  isNotNull(): Column {
    return new Column(`${this.label} IS NOT NULL`, this.references, row => !isNullish(this.evaluate(row)));
  }
}

/** Reference a column by name */
export function col(name: string): Column {
  return new Column(name, [name], row => row[name] ?? null);
}

/** Wrap a literal value */
export function lit(value: Scalar): Column {
  return new Column(describe(value), [], () => value);
}

/**
 * AND of all conditions, `lit(true)` for none
 */
export function allOf(conditions: readonly Column[]): Column {
  return conditions.reduce<Column>((acc, condition) => acc.and(condition), lit(true));
}

/**
 * OR of all conditions, `lit(false)` for none
 */
export function anyOf(conditions: readonly Column[]): Column {
  return conditions.reduce<Column>((acc, condition) => acc.or(condition), lit(false));
}

/**
 * Parse a string column into epoch milliseconds; unparseable cells become null
 */
export function toTimestamp(column: Column, format: string): Column {
  return new Column(
    `to_timestamp(${column.label}, '${format}')`,
    column.references,
    row => parseDate(column.evaluate(row), format)?.getTime() ?? null
  );
}
