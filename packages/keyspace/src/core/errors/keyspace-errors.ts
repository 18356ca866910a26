import { BaseError } from "@keyscope/errors"

export type KeyspaceErrorCode = "invalid_argument" | "not_connected"

/** Caller misuse. */
export class KeyspaceError extends BaseError<KeyspaceErrorCode> {
  static invalidArgument(message: string, context: Record<string, unknown>): KeyspaceError {
    return new KeyspaceError(message, {
      code: "invalid_argument",
      context,
      isOperational: false,
    })
  }

  static notConnected(label: string): KeyspaceError {
    return new KeyspaceError(`Not connected to ${label}`, {
      code: "not_connected",
      context: { session: label },
    })
  }
}

export class TransportError extends BaseError<"transport_failure"> {
  static fromCause(operation: string, cause: unknown, context: Record<string, unknown> = {}): TransportError {
    const reason = cause instanceof Error ? cause.message : String(cause)

    return new TransportError(`${operation} failed: ${reason}`, {
      code: "transport_failure",
      context: { operation, ...context },
      cause,
      isRetryable: true,
    })
  }
}

export class ResolutionError extends BaseError<"resolution_failure"> {
  static forKeys(keys: readonly string[], cause?: unknown): ResolutionError {
    return new ResolutionError(`Could not resolve the type of ${keys.length} key(s)`, {
      code: "resolution_failure",
      context: { keys: [...keys] },
      ...(cause !== undefined && { cause }),
      isRetryable: true,
    })
  }
}

export class ScanAbortedError extends BaseError<"scan_aborted"> {
  static create(pattern: string, cursor: string): ScanAbortedError {
    return new ScanAbortedError("Scan was aborted", {
      code: "scan_aborted",
      context: { pattern, cursor },
    })
  }
}

export function isScanAborted(err: unknown): err is ScanAbortedError {
  return err instanceof ScanAbortedError
}
