/**
 * Context attached to validation failures
 */
export interface ValidationErrorContext {
  metric?: string;
  tool?: string;
}

/**
 * Base error class for data-quality errors
 */
export class DataQualityError extends Error {
  constructor(
    message: string,
    public suggestions: string[] = []
  ) {
    super(message);
    this.name = "DataQualityError";
  }

  /**
   * Factory method for creating validation errors with appropriate suggestions
   */
  static createValidationError(
    message: string,
    context: ValidationErrorContext
  ): DataQualityError {
    const contextStr = Object.entries(context)
      .filter(([_, value]) => value !== undefined)
      .map(([key, value]) => `${key}="${value}"`)
      .join(", ");

    return new DataQualityError(
      `Validation failed: ${message}`,
      [
        ...(contextStr ? [`Check the arguments for ${contextStr}`] : []),
        "Call list_metrics to see the parameters every metric kind accepts",
        "Limits are written as { \"key\": [lower, upper] } with lower <= upper",
      ]
    );
  }

  /**
   * Get a formatted error message including suggestions
   */
  getFormattedMessage(): string {
    let output = this.message;
    if (this.suggestions.length > 0) {
      output += "\n\nSuggested next steps:";
      this.suggestions.forEach(suggestion => {
        output += `\n- ${suggestion}`;
      });
    }
    return output;
  }
}

/**
 * A checklist entry names a table that was not supplied to `fit`
 */
export class TableNotFoundError extends DataQualityError {
  constructor(public tableName: string, available: string[]) {
    super(
      `Table '${tableName}' not found`,
      [`Registered tables: ${available.length > 0 ? available.join(", ") : "(none)"}`]
    );
    this.name = "TableNotFoundError";
  }
}

/**
 * A metric could not be computed against a table
 */
export class MetricEvaluationError extends DataQualityError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, suggestions);
    this.name = "MetricEvaluationError";
  }
}

export class MissingColumnError extends MetricEvaluationError {
  constructor(public column: string, available: readonly string[]) {
    super(
      `Column '${column}' not found`,
      [`Available columns: ${available.length > 0 ? available.join(", ") : "(none)"}`]
    );
    this.name = "MissingColumnError";
  }
}

/**
 * The value passed as a table is neither a local nor a distributed table
 */
export class UnsupportedTableKindError extends DataQualityError {
  constructor(kind: string) {
    super(
      `Unsupported table kind: ${kind}. Supported kinds: local, distributed`,
      ["Build tables with createLocalTable or createDistributedTable"]
    );
    this.name = "UnsupportedTableKindError";
  }
}

export class UnknownEngineError extends DataQualityError {
  constructor(engine: string) {
    super(`Unknown engine: ${engine}. Supported engines: local, distributed`);
    this.name = "UnknownEngineError";
  }
}

export class NotFittedError extends DataQualityError {
  constructor() {
    super("This Report instance is not fitted yet. Call 'fit' before using this method.");
    this.name = "NotFittedError";
  }
}

export class EmptyChecklistError extends DataQualityError {
  constructor() {
    super("Checklist is empty", ["Add at least one { table, metric, limits } entry"]);
    this.name = "EmptyChecklistError";
  }
}
