import { AppError, errorMessage } from "@wikindex/errors";
import type { Logger } from "@wikindex/logger";

/** Log a failure and return the process exit code it maps to. */
export function reportError(err: unknown, logger: Logger): number {
  if (AppError.isAppError(err)) {
    logger.error(
      { code: err.code, hint: err.hint, details: err.details },
      err.message,
    );
    if (!err.isOperational) logger.debug({ err }, "Stack trace");
    return err.exitCode;
  }

  logger.error({ err }, `Unexpected error: ${errorMessage(err)}`);
  return 1;
}
