export const SceneErrorCode = {
  INVALID_PARENT: "INVALID_PARENT",
  UNKNOWN_IDENTIFIER: "UNKNOWN_IDENTIFIER",
  INVALID_IDENTIFIER: "INVALID_IDENTIFIER",
  DUPLICATE_IDENTIFIER: "DUPLICATE_IDENTIFIER",
  INVALID_VALUE: "INVALID_VALUE",
  MALFORMED_MESSAGE: "MALFORMED_MESSAGE",
  QUEUE_OVERFLOW: "QUEUE_OVERFLOW",
  CALLBACK_FAILURE: "CALLBACK_FAILURE",
  SESSION_CLOSED: "SESSION_CLOSED",
} as const;

export type SceneErrorCode = (typeof SceneErrorCode)[keyof typeof SceneErrorCode];

export type SceneErrorContext = {
  identifier?: string;
  sessionId?: string;
  cause?: unknown;
};

export class SceneSyncError extends Error {
  readonly code: SceneErrorCode;
  /** The message without its code prefix. */
  readonly detail: string;
  readonly identifier?: string;
  readonly sessionId?: string;

  constructor(code: SceneErrorCode, message: string, ctx: SceneErrorContext = {}) {
    super(`${code}: ${message}`, ctx.cause === undefined ? undefined : { cause: ctx.cause });
    this.name = "SceneSyncError";
    this.code = code;
    this.detail = message;
    this.identifier = ctx.identifier;
    this.sessionId = ctx.sessionId;
  }
}

export function isSceneSyncError(err: unknown, code?: SceneErrorCode): err is SceneSyncError {
  return err instanceof SceneSyncError && (code === undefined || err.code === code);
}

/**
 * Attach the session an error belongs to, keeping code and message.
 */
export function withSession(err: SceneSyncError, sessionId: string): SceneSyncError {
  if (err.sessionId === sessionId) return err;
  return new SceneSyncError(err.code, err.detail, { identifier: err.identifier, sessionId, cause: err.cause });
}

export function malformed(message: string, ctx: SceneErrorContext = {}): SceneSyncError {
  return new SceneSyncError(SceneErrorCode.MALFORMED_MESSAGE, message, ctx);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
