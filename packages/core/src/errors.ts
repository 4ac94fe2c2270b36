// ============================================================================
// @treekey/core — Error Types
// ============================================================================

/**
 * Base error class for all treekey errors.
 */
export class TreekeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreekeyError';
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when markup text cannot be parsed into a document.
 */
export class XmlParseError extends TreekeyError {
  public readonly source?: string;
  public readonly reason: string;

  constructor(reason: string, source?: string) {
    super(source ? `Failed to parse XML from "${source}": ${reason}` : `Failed to parse XML: ${reason}`);
    this.name = 'XmlParseError';
    this.source = source;
    this.reason = reason;
  }
}

/**
 * Thrown when a named source cannot be read.
 */
export class SourceLoadError extends TreekeyError {
  public readonly source: string;
  public readonly reason: string;

  constructor(source: string, reason: string) {
    super(`Failed to load "${source}": ${reason}`);
    this.name = 'SourceLoadError';
    this.source = source;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Traversal Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a tree is deeper than the configured bound.
 */
export class TreeDepthExceededError extends TreekeyError {
  public readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`Tree depth exceeds the limit of ${maxDepth}.`);
    this.name = 'TreeDepthExceededError';
    this.maxDepth = maxDepth;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a configuration value is invalid.
 */
export class ConfigError extends TreekeyError {
  public readonly key: string;
  public readonly reason: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.name = 'ConfigError';
    this.key = key;
    this.reason = reason;
  }
}

/**
 * Thrown when a suite definition file is unreadable or malformed.
 */
export class SuiteDefinitionError extends TreekeyError {
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Invalid suite definition "${path}": ${reason}`);
    this.name = 'SuiteDefinitionError';
    this.path = path;
    this.reason = reason;
  }
}
