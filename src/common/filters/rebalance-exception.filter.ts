import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { RebalanceError, RebalanceErrorCode } from '../errors/rebalance.errors';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

const STATUS_BY_CODE: Record<RebalanceErrorCode, HttpStatus> = {
  CONFIG_MISSING_KEY: HttpStatus.BAD_REQUEST,
  INVALID_CONFIG: HttpStatus.BAD_REQUEST,
  MALFORMED_NUMBER: HttpStatus.BAD_REQUEST,
  FILE_NOT_FOUND: HttpStatus.NOT_FOUND,
};

/** Maps domain errors to the API's error body */
@Catch(RebalanceError)
export class RebalanceExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RebalanceExceptionFilter.name);

  catch(exception: RebalanceError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const statusCode = STATUS_BY_CODE[exception.code];

    this.logger.warn(`${request.method} ${request.url} -> ${statusCode}: ${exception.message}`);

    const body: HttpExceptionResponse = {
      statusCode,
      message: exception.message,
      error: exception.code,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }
}
