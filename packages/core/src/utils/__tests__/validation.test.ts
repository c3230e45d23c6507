import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { validate } from '../validation.js';
import { ParloopError, ErrorCode } from '../../errors.js';

describe('validate', () => {
  const schema = z.object({
    name: z.string(),
    age: z.number(),
  });

  it('returns parsed data for valid input', () => {
    const result = validate(schema, { name: 'Alice', age: 30 });
    expect(result).toEqual({ name: 'Alice', age: 30 });
  });

  it('strips unknown keys', () => {
    const result = validate(schema, { name: 'Bob', age: 25, extra: true });
    expect(result).toEqual({ name: 'Bob', age: 25 });
  });

  it('throws ParloopError on validation failure', () => {
    expect(() => validate(schema, {})).toThrow(ParloopError);
  });

  it('includes fieldName in error message when provided', () => {
    try {
      validate(schema, {}, 'user');
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.message).toContain('for user');
    }
  });

  it('formats issues as a numbered list', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.message).toContain('1.');
      expect(parloopErr.message).toContain('[name]');
    }
  });

  it('uses (root) for top-level schema errors', () => {
    try {
      validate(z.string(), 42);
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.message).toContain('(root)');
    }
  });

  it('uses INPUT_INVALID error code', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.code).toBe(ErrorCode.INPUT_INVALID);
    }
  });

  it('includes issue count in userMessage', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.userMessage).toContain('issue(s) found');
    }
  });

  it('includes field in context', () => {
    try {
      validate(schema, {}, 'config');
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.context['field']).toBe('config');
    }
  });

  it('works without fieldName', () => {
    try {
      validate(schema, {});
      expect.fail('should have thrown');
    } catch (error) {
      const parloopErr = error as ParloopError;
      expect(parloopErr.message).toContain('Validation failed');
      expect(parloopErr.message).not.toContain('for ');
    }
  });
});
