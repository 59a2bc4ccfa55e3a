/**
 * Error types raised around the search core (config and catalog loading).
 * The search itself never throws.
 */

export class ToolSearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolSearchError';
  }
}

export class ToolSearchConfigError extends ToolSearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolSearchConfigError';
  }
}

export class CatalogLoadError extends ToolSearchError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load tool catalog ${path}: ${message}`, options);
    this.name = 'CatalogLoadError';
    this.path = path;
  }
}

/** Catalog value that does not match the catalog schema */
export class InvalidCatalogError extends ToolSearchError {
  readonly issues: string;

  constructor(issues: string) {
    super(`Invalid tool catalog:\n${issues}`);
    this.name = 'InvalidCatalogError';
    this.issues = issues;
  }
}
