/**
 * Structured error types for the traffic-law QA core.
 *
 * QAError carries an error code, severity and recovery hint so that the
 * pipeline boundary can turn any failure into a structured response.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Knowledge graph
  GRAPH_BUILD_ERROR = 'GRAPH_BUILD_ERROR',
  GRAPH_NOT_BUILT = 'GRAPH_NOT_BUILT',
  NODE_NOT_FOUND = 'NODE_NOT_FOUND',

  // Corpus / config
  CORPUS_LOAD_ERROR = 'CORPUS_LOAD_ERROR',
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Embeddings
  EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
  EMBEDDING_CACHE_ERROR = 'EMBEDDING_CACHE_ERROR',

  // Query pipeline
  MATCHER_NOT_READY = 'MATCHER_NOT_READY',
  QUERY_CANCELLED = 'QUERY_CANCELLED',
  INVALID_QUERY = 'INVALID_QUERY',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INVALID_STATE = 'INVALID_STATE',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

export interface QAErrorOptions {
  severity?: ErrorSeverity;
  recoverable?: boolean;
  context?: Record<string, unknown>;
  originalError?: Error;
}

// ─── QAError ───

export class QAError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  /** Whether the process can keep serving queries after this error */
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(message: string, code: ErrorCode, options: QAErrorOptions = {}) {
    super(message);
    this.name = 'QAError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for the answer consumer or logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
    };
  }

  static isQAError(value: unknown): value is QAError {
    return value instanceof QAError;
  }

  /** Wrap any thrown value into a QAError */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: Record<string, unknown>): QAError {
    if (error instanceof QAError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new QAError(originalError.message, code, { originalError, context });
  }
}

// ─── Specific errors ───

/** Malformed or incomplete corpus at load time. Aborts startup. */
export class GraphBuildError extends QAError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.GRAPH_BUILD_ERROR, { severity: 'fatal', recoverable: false, context });
    this.name = 'GraphBuildError';
  }
}

/** Lookup of a node id that is not in the graph. */
export class NotFoundError extends QAError {
  public readonly nodeId: string;

  constructor(nodeId: string) {
    super(`Node not found: ${nodeId}`, ErrorCode.NODE_NOT_FOUND, { context: { nodeId } });
    this.name = 'NotFoundError';
    this.nodeId = nodeId;
  }
}

/** The external embedding capability failed or returned an unusable vector. */
export class EmbeddingUnavailableError extends QAError {
  constructor(message: string, options: { model?: string; originalError?: Error } = {}) {
    super(message, ErrorCode.EMBEDDING_UNAVAILABLE, {
      recoverable: true,
      context: options.model ? { model: options.model } : undefined,
      originalError: options.originalError,
    });
    this.name = 'EmbeddingUnavailableError';
  }
}

export class ConfigError extends QAError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_VALIDATION_ERROR, originalError?: Error) {
    super(message, code, { severity: 'fatal', recoverable: false, originalError });
    this.name = 'ConfigError';
  }
}

export class CorpusLoadError extends QAError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(message, ErrorCode.CORPUS_LOAD_ERROR, { severity: 'fatal', recoverable: false, context, originalError });
    this.name = 'CorpusLoadError';
  }
}
