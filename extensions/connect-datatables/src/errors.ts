/**
 * Error types
 */

export class ConfigurationError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class DataTableError extends Error {
  constructor(message: string, public tableName: string, public code?: string) {
    super(message);
    this.name = "DataTableError";
  }
}
