/**
 * Error taxonomy for the gateway.
 *
 * Every error carries a stable `code` and the HTTP status the API layer
 * answers with. Errors local to one tool call or one schema property are
 * absorbed and reported as values; session and connection errors propagate.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_INVALID", 500, details);
    this.name = "ConfigError";
  }
}

/**
 * The handshake with the Tool Host did not complete
 */
export class ConnectionError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, "CONNECTION_FAILED", 503, details);
    this.name = "ConnectionError";
  }
}

/**
 * The Tool Host could not be reached at all (spawn failed, bad URL, refused)
 */
export class HostUnavailableError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, "HOST_UNAVAILABLE", 503, details);
    this.name = "HostUnavailableError";
  }
}

export class NotConnectedError extends BridgeError {
  constructor(message = "Tool session is not connected") {
    super(message, "SESSION_NOT_CONNECTED", 409);
    this.name = "NotConnectedError";
  }
}

/**
 * The channel to the Tool Host died mid-flight. The session must be
 * reconnected before it can be used again.
 */
export class SessionBrokenError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, "SESSION_BROKEN", 503, details);
    this.name = "SessionBrokenError";
  }
}

export type ToolCallErrorCode = "TOOL_CALL_FAILED" | "TOOL_CALL_TIMEOUT" | "TOOL_NOT_FOUND";

const TOOL_CALL_STATUS: Record<ToolCallErrorCode, number> = {
  TOOL_CALL_FAILED: 502,
  TOOL_CALL_TIMEOUT: 504,
  TOOL_NOT_FOUND: 404,
};

export class ToolCallError extends BridgeError {
  constructor(
    message: string,
    public readonly toolName: string,
    code: ToolCallErrorCode = "TOOL_CALL_FAILED",
    details?: unknown
  ) {
    super(message, code, TOOL_CALL_STATUS[code], details);
    this.name = "ToolCallError";
  }
}

export class BackendTimeoutError extends BridgeError {
  constructor(
    public readonly backend: string,
    public readonly timeoutMs: number
  ) {
    super(`${backend} call timed out after ${timeoutMs}ms`, "BACKEND_TIMEOUT", 504);
    this.name = "BackendTimeoutError";
  }
}

export class BackendError extends BridgeError {
  constructor(
    public readonly backend: string,
    message: string,
    details?: unknown
  ) {
    super(message, "BACKEND_ERROR", 502, details);
    this.name = "BackendError";
  }
}

export class SchemaTranslationError extends BridgeError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, "SCHEMA_TRANSLATION_FAILED", 500);
    this.name = "SchemaTranslationError";
  }
}

/**
 * Extract a human readable message from any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
