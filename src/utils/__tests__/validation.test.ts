/**
 * Unit tests for the zod validation adapter.
 */

import { z } from 'zod';
import { ValidationError, formatIssues, parseWith } from '../validation';

const RetrySchema = z.object({
  queue: z.string().min(1, 'Queue name is required'),
  attempts: z.coerce.number().int().min(1).max(10).default(3),
});

describe('validation', () => {
  describe('parseWith', () => {
    it('should return Ok with the parsed value', () => {
      const res = parseWith(RetrySchema, { queue: 'email', attempts: '5' });

      expect(res.isOk()).toBe(true);
      expect(res.unwrapUnsafe()).toEqual({ queue: 'email', attempts: 5 });
    });

    it('should apply schema defaults', () => {
      expect(parseWith(RetrySchema, { queue: 'email' }).unwrapUnsafe().attempts).toBe(3);
    });

    it('should return Err with a ValidationError on invalid input', () => {
      const res = parseWith(RetrySchema, { queue: '' });
      const [, error] = res.unwrap();

      expect(res.isErr()).toBe(true);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error?.message).toBe('queue: Queue name is required');
      expect(error?.issues).toHaveLength(1);
    });

    it('should not throw for non-object input', () => {
      const res = parseWith(z.string(), 42);

      expect(res.isErr()).toBe(true);
      expect(res.unwrapOr('fallback')).toBe('fallback');
    });
  });

  describe('formatIssues', () => {
    it('should join issues with their paths', () => {
      const parsed = z
        .object({ name: z.string().min(1, 'Name is required'), tags: z.array(z.string()) })
        .safeParse({ name: '', tags: ['ok', 1] });

      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(formatIssues(parsed.error.issues)).toBe(
          'name: Name is required, tags.1: Expected string, received number'
        );
      }
    });

    it('should use the bare message for root-level issues', () => {
      const parsed = z.string().safeParse(42);

      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(formatIssues(parsed.error.issues)).toBe('Expected string, received number');
      }
    });
  });
});
