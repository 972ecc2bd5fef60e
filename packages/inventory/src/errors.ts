/**
 * Errors raised by the inventory core.
 *
 * ConfigurationError: the configuration cannot answer a question it must be
 * able to answer (no fallback entry, uneven size/size_unit).
 * ValidationError: a value or criterion is malformed.
 */

export class InventoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InventoryError";
  }
}

export class ConfigurationError extends InventoryError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends InventoryError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}
