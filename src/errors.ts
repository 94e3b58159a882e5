// src/errors.ts

export class MediaSyncError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MediaSyncError";
  }
}

/** Opening the transport failed; the run ends with status FAILED. */
export class TransportConnectError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "TransportConnectError";
  }
}

export class HashError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "HashError";
  }
}

export class CopyError extends MediaSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "CopyError";
  }
}

export class RemoteCommandError extends MediaSyncError {
  constructor(
    message: string,
    public readonly exitStatus: number | null,
    public readonly stderr: string,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
    this.name = "RemoteCommandError";
  }
}

/**
 * Raised inside the pipeline when the run's AbortSignal fires. The session
 * controller turns it into an INTERRUPTED result instead of rethrowing.
 */
export class InterruptSignal extends MediaSyncError {
  constructor(message = "sync interrupted", context?: Record<string, unknown>) {
    super(message, context);
    this.name = "InterruptSignal";
  }
}

export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError") return true;
  return "code" in err && err.code === "ABORT_ERR";
}
