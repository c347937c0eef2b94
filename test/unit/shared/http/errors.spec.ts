import { describe, it, expect } from 'vitest';
import { APP_ERROR_CODES, AppError } from '../../../../src/shared/http/errors';

describe('AppError', () => {
  it('knows only the codes the service emits', () => {
    expect(APP_ERROR_CODES).toEqual([
      'VALIDATION_ERROR',
      'INTERNAL',
      'CAPTCHA_INCORRECT',
      'CAPTCHA_INVALID',
    ]);
  });

  it('validationError() builds a 400 carrying its meta', () => {
    const err = AppError.validationError('Invalid request body', { field: 'captcha' });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AppError');
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.status).toBe(400);
    expect(err.message).toBe('Invalid request body');
    expect(err.meta).toEqual({ field: 'captcha' });
  });

  it('keeps the cause it was given', () => {
    const cause = new Error('root');
    const err = new AppError({ code: 'INTERNAL', status: 500, message: 'boom', cause });

    expect(err.cause).toBe(cause);
  });
});
