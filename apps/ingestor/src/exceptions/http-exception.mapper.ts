import {
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  BadRequestException,
  BadGatewayException,
} from '@nestjs/common';
import {
  BatchSourceNotFoundException,
  describeError,
  isIngestionException,
} from './ingestion.exception';

/**
 * Translate an ingestion failure into the HTTP exception a controller throws
 */
export function toHttpException(error: unknown, context: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (!isIngestionException(error)) {
    return new InternalServerErrorException(`${context}: ${describeError(error)}`);
  }

  switch (error.kind) {
    case 'conflict':
      return new ConflictException(error.message);
    case 'user_input':
      return error instanceof BatchSourceNotFoundException
        ? new NotFoundException(error.message)
        : new BadRequestException(error.message);
    case 'retryable':
    case 'fatal':
      return new BadGatewayException(`${context}: ${error.message}`);
    case 'persistence':
      return new InternalServerErrorException(`${context}: ${error.message}`);
  }
}
