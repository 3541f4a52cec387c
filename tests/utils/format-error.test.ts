import { describe, it, expect } from 'vitest';
import { FormatError } from '@bankcsv/types';

describe('FormatError', () => {
  it('should append the line number to the message', () => {
    const error = new FormatError('Unexpected header', 1);
    expect(error.message).toBe('Unexpected header (line 1)');
    expect(error.line).toBe(1);
  });

  it('should leave the message alone without a line', () => {
    const error = new FormatError('Missing data');
    expect(error.message).toBe('Missing data');
    expect(error.line).toBeUndefined();
  });

  it('should be an Error named FormatError', () => {
    const error = new FormatError('Bad', 3);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('FormatError');
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('Unable to parse amount: x');
    const error = new FormatError('Invalid Debit value', 6, { cause });
    expect(error.cause).toBe(cause);
  });
});
