import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import {
  ConflictError,
  PipelineError,
  PipelineErrorCode,
  ValidationFailureError,
} from './errors';

const STATUS_BY_CODE: Partial<Record<PipelineErrorCode, HttpStatus>> = {
  CONFLICT: HttpStatus.CONFLICT,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INPUT_ERROR: HttpStatus.BAD_REQUEST,
  CONFIGURATION_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
  VALIDATION_FAILURE: HttpStatus.UNPROCESSABLE_ENTITY,
};

/**
 * Maps domain errors reaching a controller to HTTP responses.
 */
@Catch(PipelineError)
export class DomainExceptionFilter implements ExceptionFilter<PipelineError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(error: PipelineError, host: ArgumentsHost) {
    const { httpAdapter } = this.adapterHost;
    const status = STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
    if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`💥 Unmapped ${error.code}: ${error.message}`, error.stack);
    }

    const body: Record<string, unknown> = {
      statusCode: status,
      error: error.code,
      message: error.message,
    };
    if (error instanceof ConflictError) {
      body.activeRunId = error.activeRunId;
    }
    if (error instanceof ValidationFailureError) {
      body.violations = error.result.violations;
    }

    httpAdapter.reply(host.switchToHttp().getResponse(), body, status);
  }
}
