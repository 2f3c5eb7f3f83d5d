export type LauncherErrorCode = "BASE_DIR_UNRESOLVED" | "CONFIG_INVALID" | "INTERRUPTED";

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;

  constructor(code: LauncherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LauncherError";
    this.code = code;
  }
}

export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
