import { MulterError } from 'multer';
import { z } from 'zod';
import { toAppError } from '../../src/middlewares/errorHandler';
import { AppError } from '../../src/utils/AppError';

describe('toAppError', () => {
  it('should pass AppError through unchanged', () => {
    const error = AppError.notFound();

    expect(toAppError(error)).toBe(error);
  });

  it('should turn a ZodError into a 400 listing each issue', () => {
    const result = z.object({ query: z.string().min(1, 'query is required') }).safeParse({ query: '' });
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    const error = toAppError(result.error);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      statusCode: 400,
      message: 'Validation failed: query: query is required',
    });
  });

  it('should name a root-level issue "value"', () => {
    const result = z.string().safeParse(42);
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    expect(toAppError(result.error).message).toBe('Validation failed: value: Expected string, received number');
  });

  it('should map an oversized upload to 413', () => {
    expect(toAppError(new MulterError('LIMIT_FILE_SIZE', 'file'))).toMatchObject({
      statusCode: 413,
      message: 'Uploaded file is too large',
    });
  });

  it('should map other upload errors to 400', () => {
    const error = toAppError(new MulterError('LIMIT_UNEXPECTED_FILE', 'other'));

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ statusCode: 400 });
  });

  it('should map an oversized body to 413', () => {
    const error = Object.assign(new Error('request entity too large'), {
      status: 413,
      type: 'entity.too.large',
    });

    expect(toAppError(error)).toMatchObject({ statusCode: 413, message: 'Request body is too large' });
  });

  it('should map unparsable JSON to 400', () => {
    const error = Object.assign(new Error('Unexpected token'), { status: 400, type: 'entity.parse.failed' });

    expect(toAppError(error)).toMatchObject({ statusCode: 400, message: 'Malformed request body' });
  });

  it('should leave unknown errors alone', () => {
    const error = new Error('boom');

    expect(toAppError(error)).toBe(error);
  });
});
