export type ErrorCategory = "validation" | "connection" | "routing" | "output" | "internal";

/**
 * Serializable error payload shown to the operator (status output and JSON results)
 */
export interface ErrorInfo {
  code: string;
  error: string;
  category: ErrorCategory;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly category: ErrorCategory,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RetrievalError";
  }

  toErrorInfo(): ErrorInfo {
    const info: ErrorInfo = {
      code: this.code,
      error: this.message,
      category: this.category,
    };
    if (this.suggestion) info.suggestion = this.suggestion;
    if (this.details) info.details = this.details;
    return info;
  }
}

export class QueueNotFoundError extends RetrievalError {
  constructor(public readonly queue: string, cause?: unknown) {
    super(
      `Queue '${queue}' not found`,
      "QUEUE_NOT_FOUND",
      "routing",
      "Check if the queue exists and is correctly configured",
      cause instanceof Error ? { reason: cause.message } : undefined
    );
    this.name = "QueueNotFoundError";
  }
}

/**
 * Options that cannot be combined, e.g. an explicit prefetch with requeue mode
 */
export class ConfigurationConflictError extends RetrievalError {
  constructor(message: string, suggestion?: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_CONFLICT", "validation", suggestion, details);
    this.name = "ConfigurationConflictError";
  }
}

export class ConfigValidationError extends RetrievalError {
  constructor(message: string, public readonly issues: string[], source?: string) {
    super(
      message,
      "INVALID_CONFIGURATION",
      "validation",
      "Fix the listed settings in the configuration file, environment or command line",
      { issues, ...(source ? { source } : {}) }
    );
    this.name = "ConfigValidationError";
  }
}

export class BrokerConnectionError extends RetrievalError {
  constructor(public readonly target: string, cause?: unknown) {
    super(
      `Failed to connect to RabbitMQ at ${target}`,
      "CONNECTION_FAILED",
      "connection",
      "Check that the broker is running and the host, port and credentials are correct",
      cause instanceof Error ? { reason: cause.message } : undefined
    );
    this.name = "BrokerConnectionError";
  }
}

export class OutputSinkError extends RetrievalError {
  constructor(public readonly deliveryTag: number, cause: unknown) {
    super(
      `Failed to write message #${deliveryTag}: ${cause instanceof Error ? cause.message : String(cause)}`,
      "OUTPUT_FAILED",
      "output",
      "Check the output destination is writable",
      { deliveryTag }
    );
    this.name = "OutputSinkError";
  }
}

/**
 * Normalizes anything thrown into an ErrorInfo for display
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof RetrievalError) {
    return error.toErrorInfo();
  }

  return {
    code: "INTERNAL_ERROR",
    error: error instanceof Error ? error.message : String(error),
    category: "internal",
  };
}
