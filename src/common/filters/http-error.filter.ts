import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { STATUS_CODES } from 'http';

export const INTERNAL_ERROR_MESSAGE = 'Sorry, something went wrong on our side.';

function clientErrorStatus(exception: unknown): number | null {
  if (typeof exception !== 'object' || exception === null || !('status' in exception)) return null;
  const { status } = exception;
  return typeof status === 'number' && status >= 400 && status <= 499 ? status : null;
}

/**
 * Renders every error as `{ error: { <reason>: <message> } }`.
 *
 * HttpExceptions keep their status and message (validation failures carry the
 * list of messages). Express client errors (413 from body-parser) keep their
 * status. Anything else, PersistenceError included, becomes a
 * generic 500 and is only logged.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly log = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      let reason = STATUS_CODES[status] ?? 'Error';
      let message: unknown = exception.message;
      if (typeof body === 'string') {
        message = body;
      } else {
        if ('error' in body && typeof body.error === 'string') reason = body.error;
        if ('message' in body) message = body.message;
      }

      res.status(status).json({ error: { [reason]: message } });
      return;
    }

    // express middleware (body-parser) rejects requests with plain errors carrying a status
    const clientStatus = clientErrorStatus(exception);
    if (exception instanceof Error && clientStatus !== null) {
      res
        .status(clientStatus)
        .json({ error: { [STATUS_CODES[clientStatus] ?? 'Error']: exception.message } });
      return;
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.log.error('Unhandled error', stack);

    res
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json({ error: { 'Internal Server Error': INTERNAL_ERROR_MESSAGE } });
  }
}
