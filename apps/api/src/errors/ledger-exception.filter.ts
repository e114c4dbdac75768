import {
  Catch,
  HttpStatus,
  Logger,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import type { Response } from 'express';
import { CsvFormatError, ValidationError } from '@stock-tracker/ledger';

export type LedgerErrorBody = {
  statusCode: number;
  error: string;
  message: string;
};

export function ledgerErrorBody(
  exception: ValidationError | CsvFormatError,
): LedgerErrorBody {
  const statusCode =
    exception instanceof ValidationError
      ? HttpStatus.BAD_REQUEST
      : HttpStatus.INTERNAL_SERVER_ERROR;
  return { statusCode, error: exception.name, message: exception.message };
}

@Catch(ValidationError, CsvFormatError)
export class LedgerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(LedgerExceptionFilter.name);

  catch(exception: ValidationError | CsvFormatError, host: ArgumentsHost) {
    const body = ledgerErrorBody(exception);
    if (exception instanceof CsvFormatError) {
      this.logger.error(exception.message);
    }
    host
      .switchToHttp()
      .getResponse<Response>()
      .status(body.statusCode)
      .json(body);
  }
}
