import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';
import { describeException } from './http-exception.filter';
import { fail, unwrapResult } from '../result/operation-result';

describe('describeException', () => {
  it('keeps validation messages from Nest exceptions', () => {
    expect(describeException(new BadRequestException(['amount must be positive']))).toEqual({
      statusCode: 400,
      error: 'BadRequestException',
      message: ['amount must be positive'],
    });
  });

  it('passes the status of a failed operation result through', () => {
    let thrown: unknown;
    try {
      unwrapResult(fail('verification_failed', 'Signature mismatch'));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(HttpException);
    expect(describeException(thrown)).toEqual({
      statusCode: HttpStatus.PAYMENT_REQUIRED,
      error: 'HttpException',
      message: 'Signature mismatch',
      status: 'verification_failed',
    });
  });

  it('hides the message of unexpected errors', () => {
    expect(describeException(new Error('relation "payments" does not exist'))).toEqual({
      statusCode: 500,
      error: 'Error',
      message: 'Internal server error',
    });
  });
});
