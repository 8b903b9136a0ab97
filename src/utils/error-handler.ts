import {
  IPipelineError,
  PipelineErrorCode,
  PipelineErrorDetails,
  PipelineFailure
} from '../types';

export class ErrorHandler {
  static createError(
    code: PipelineErrorCode,
    message: string,
    details?: PipelineErrorDetails
  ): IPipelineError {
    return Object.assign(new Error(message), { code, details });
  }

  static isPipelineError(error: unknown): error is IPipelineError {
    return (
      error instanceof Error &&
      'code' in error &&
      Object.values<unknown>(PipelineErrorCode).includes(error.code)
    );
  }

  static isCancellation(error: unknown): boolean {
    return ErrorHandler.isPipelineError(error) && error.code === PipelineErrorCode.Cancelled;
  }

  // Node fs errors carry a string code such as ENOENT and the offending path
  static fromFsError(error: unknown, path: string): IPipelineError {
    const reason = error instanceof Error ? error.message : String(error);
    return ErrorHandler.createError(
      PipelineErrorCode.IOError,
      `Cannot access ${path}: ${reason}`,
      { path, cause: error }
    );
  }

  static toFailure(error: unknown): PipelineFailure {
    if (ErrorHandler.isPipelineError(error)) {
      return {
        code: error.code,
        message: error.message,
        path: error.details?.path,
        layer: error.details?.layer,
        line: error.details?.line
      };
    }
    return {
      code: PipelineErrorCode.IOError,
      message: error instanceof Error ? error.message : String(error)
    };
  }

  static formatError(error: Error | IPipelineError): string {
    if (ErrorHandler.isPipelineError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    return error.message;
  }

  static throwIfAborted(signal: AbortSignal | undefined, where: string): void {
    if (signal?.aborted) {
      throw ErrorHandler.createError(PipelineErrorCode.Cancelled, `${where} cancelled`);
    }
  }
}
