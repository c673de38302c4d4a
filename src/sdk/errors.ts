/**
 * Typed SDK errors.
 *
 * Every SDK function throws an SdkError instead of calling process.exit().
 * The CLI layer catches and translates to its JSON envelope.
 */

export type SdkErrorCode =
  | "AUTH_MISSING"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "API_ERROR"
  | "DECODE_ERROR"
  | "INVALID_INPUT"
  | "INVALID_FILTER"
  | "SYNC_EXPIRED"
  | "NO_WORKSPACE"
  | "WORKSPACE_NOT_FOUND"
  | "AMBIGUOUS_WORKSPACE"
  | "COMMAND_FAILED"
  | "NETWORK_ERROR"
  | "RATE_LIMITED";

export class SdkError extends Error {
  readonly code: SdkErrorCode;
  /** Human-readable remediation hint. */
  readonly fix: string;
  /** HTTP status when the error came from a response. */
  readonly status?: number;

  constructor(
    message: string,
    code: SdkErrorCode,
    fix = "Check the error message and retry.",
    status?: number,
  ) {
    super(message);
    this.name = "SdkError";
    this.code = code;
    this.fix = fix;
    this.status = status;
  }
}

/**
 * The server rejected a sync token as too old and handed back a fresh one.
 * Raised only where a caller cannot simply adopt the new token (mid-drain).
 */
export class SyncExpiredError extends SdkError {
  readonly resource: string;
  readonly sync: string;

  constructor(resource: string, sync: string) {
    super(
      `Sync token for resource ${resource} is invalid or too old.`,
      "SYNC_EXPIRED",
      `Restart from the fresh token: asana-pulse events-get --gid ${resource} --sync ${sync}`,
      412,
    );
    this.name = "SyncExpiredError";
    this.resource = resource;
    this.sync = sync;
  }
}

export function isSdkError(value: unknown): value is SdkError {
  return value instanceof SdkError;
}

/** Throws immediately. */
export function sdkError(message: string, code: SdkErrorCode, fix?: string): never {
  throw new SdkError(message, code, fix);
}

/** Maps an HTTP status to the error code callers branch on. */
export function codeForStatus(status: number): SdkErrorCode {
  switch (status) {
    case 401:
      return "AUTH_MISSING";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    case 412:
      return "SYNC_EXPIRED";
    case 429:
      return "RATE_LIMITED";
    default:
      return "API_ERROR";
  }
}

const CODE_TO_FIX: Partial<Record<SdkErrorCode, string>> = {
  AUTH_MISSING:
    "Set ASANA_ACCESS_TOKEN to a valid personal access token from the Asana developer console.",
  FORBIDDEN:
    "Check that the token user has access to the workspace/project/task.",
  NOT_FOUND:
    "Verify the GID and that the token user can see the resource.",
  RATE_LIMITED:
    "Back off and retry. Increase the poll interval for long-running monitors.",
  SYNC_EXPIRED:
    "Run 'asana-pulse events-sync --gid <resource>' to obtain a fresh sync token.",
};

export function fixForCode(code: SdkErrorCode, status: number, statusText: string): string {
  return CODE_TO_FIX[code] ?? `HTTP ${status}: ${statusText}`.trim();
}

/** Passes SdkErrors through; anything else becomes COMMAND_FAILED. */
export function toSdkError(err: unknown): SdkError {
  if (err instanceof SdkError) return err;
  return new SdkError(err instanceof Error ? err.message : String(err), "COMMAND_FAILED");
}
