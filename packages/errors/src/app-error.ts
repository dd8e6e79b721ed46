export interface AppErrorOptions {
  message: string;
  code: string;
  exitCode?: number;
  isOperational?: boolean;
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    code,
    exitCode = 1,
    isOperational = true,
    hint,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.isOperational = isOperational;
    this.hint = hint;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
