import { z } from 'zod';
import { InvalidProjectionInputError, isInvalidInputError } from '../../utils/errors';

describe('InvalidProjectionInputError', () => {
  it('should list every issue in the message', () => {
    const error = new InvalidProjectionInputError([
      { path: 'buy.loanTerm', message: 'too small' },
      { path: '', message: 'required' },
    ]);

    expect(error.name).toBe('InvalidProjectionInputError');
    expect(error.message).toBe('Invalid projection input: buy.loanTerm: too small; (root): required');
  });

  it('should convert zod issues into dotted paths', () => {
    const result = z.object({ common: z.object({ sellAfterYears: z.number() }) }).safeParse({ common: {} });
    if (result.success) {
      throw new Error('expected parsing to fail');
    }
    const error = InvalidProjectionInputError.fromZodError(result.error);

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].path).toBe('common.sellAfterYears');
  });
});

describe('isInvalidInputError', () => {
  it('should recognise only invalid input errors', () => {
    expect(isInvalidInputError(new InvalidProjectionInputError([]))).toBe(true);
    expect(isInvalidInputError(new Error('boom'))).toBe(false);
    expect(isInvalidInputError('boom')).toBe(false);
  });
});
