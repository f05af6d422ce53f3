import { HttpException, HttpStatus } from '@nestjs/common';
import {
  CaptureUnavailableError,
  NoDisplayFoundError,
  errorMessage,
} from '@screenpilot/shared';

/**
 * Maps display faults to 503 with an `{error, message}` body. Anything else is
 * a 500.
 */
export function toHttpException(error: unknown): HttpException {
  if (
    error instanceof NoDisplayFoundError ||
    error instanceof CaptureUnavailableError
  ) {
    return new HttpException(
      { error: error.name, message: error.message },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
  return new HttpException(
    { error: 'InternalError', message: errorMessage(error) },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}
