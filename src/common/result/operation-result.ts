import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { InvalidAmountError } from '../money/money';
import { errorMessage, isUniqueViolation } from '../utils/errors';

export type SuccessStatus = 'ok' | 'duplicate';

export type FailureStatus =
  | 'validation_error'
  | 'not_found'
  | 'forbidden'
  | 'verification_failed'
  | 'gateway_error'
  | 'conflict'
  | 'internal_error';

export interface SuccessResult<T> {
  success: true;
  status: SuccessStatus;
  message: string;
  data: T;
}

export interface FailureResult {
  success: false;
  status: FailureStatus;
  message: string;
}

export type OperationResult<T> = SuccessResult<T> | FailureResult;

export const succeed = <T>(data: T, message: string, status: SuccessStatus = 'ok'): SuccessResult<T> => ({
  success: true,
  status,
  message,
  data,
});

export const fail = (status: FailureStatus, message: string): FailureResult => ({
  success: false,
  status,
  message,
});

/**
 * Raised by the payment flows when the gateway rejects or cannot confirm a payment.
 */
export class VerificationFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VerificationFailedError';
  }
}

export class GatewayError extends Error {
  constructor(
    readonly gateway: string,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Maps a known failure to a result. Anything not recognised is rethrown so that
 * genuinely unexpected faults still reach the exception filter.
 */
export function toFailure(error: unknown): FailureResult {
  if (error instanceof VerificationFailedError) {
    return fail('verification_failed', error.message);
  }
  if (error instanceof GatewayError) {
    return fail('gateway_error', error.message);
  }
  if (error instanceof NotFoundException) {
    return fail('not_found', error.message);
  }
  if (error instanceof ForbiddenException) {
    return fail('forbidden', error.message);
  }
  if (error instanceof ConflictException) {
    return fail('conflict', error.message);
  }
  if (error instanceof InvalidAmountError) {
    return fail('validation_error', error.message);
  }
  if (error instanceof BadRequestException || error instanceof UnprocessableEntityException) {
    return fail('validation_error', error.message);
  }
  if (isUniqueViolation(error)) {
    return fail('conflict', 'A conflicting record already exists');
  }
  if (error instanceof QueryFailedError) {
    return fail('internal_error', `Ledger update failed and was rolled back: ${errorMessage(error)}`);
  }
  throw error;
}

const STATUS_CODES: Record<FailureStatus, HttpStatus> = {
  validation_error: HttpStatus.BAD_REQUEST,
  not_found: HttpStatus.NOT_FOUND,
  forbidden: HttpStatus.FORBIDDEN,
  verification_failed: HttpStatus.PAYMENT_REQUIRED,
  gateway_error: HttpStatus.BAD_GATEWAY,
  conflict: HttpStatus.CONFLICT,
  internal_error: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Unwraps a result for a controller, raising the matching HTTP error on failure. */
export function unwrapResult<T>(result: OperationResult<T>): SuccessResult<T> {
  if (result.success) {
    return result;
  }
  throw new HttpException(result, STATUS_CODES[result.status]);
}
