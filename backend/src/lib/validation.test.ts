import { describe, it, expect } from 'vitest';
import { listFollowersSchema, removeFollowersSchema } from './validation.js';

describe('validation schemas', () => {
  describe('listFollowersSchema', () => {
    it('applies the default page size', () => {
      const result = listFollowersSchema.parse({ userId: '42' });
      expect(result).toEqual({ userId: '42', count: 20 });
    });

    it('keeps the cursor verbatim', () => {
      const cursor = '1823456789012345678|1823456789012345670';
      expect(listFollowersSchema.parse({ cursor }).cursor).toBe(cursor);
    });

    it('accepts a null cursor as the first page', () => {
      expect(listFollowersSchema.parse({ cursor: null }).cursor).toBeNull();
    });

    it('coerces a numeric string count', () => {
      expect(listFollowersSchema.parse({ count: '50' }).count).toBe(50);
    });

    it('rejects a count above the maximum', () => {
      expect(listFollowersSchema.safeParse({ count: 101 }).success).toBe(false);
    });

    it('rejects an empty cursor', () => {
      expect(listFollowersSchema.safeParse({ cursor: '' }).success).toBe(false);
    });

    it('accepts cookies as a string or a record', () => {
      expect(listFollowersSchema.safeParse({ credentials: { cookies: 'a=b' } }).success).toBe(true);
      expect(listFollowersSchema.safeParse({ credentials: { cookies: { a: 'b' } } }).success).toBe(true);
      expect(listFollowersSchema.safeParse({ credentials: { cookies: 7 } }).success).toBe(false);
    });
  });

  describe('removeFollowersSchema', () => {
    it('accepts a list of targets', () => {
      const result = removeFollowersSchema.parse({ targets: ['u1', 'u2'] });
      expect(result.targets).toEqual(['u1', 'u2']);
    });

    it('trims target ids', () => {
      expect(removeFollowersSchema.parse({ targets: [' u1 '] }).targets).toEqual(['u1']);
    });

    it('rejects an empty batch', () => {
      expect(removeFollowersSchema.safeParse({ targets: [] }).success).toBe(false);
    });

    it('rejects blank target ids', () => {
      expect(removeFollowersSchema.safeParse({ targets: ['u1', '  '] }).success).toBe(false);
    });

    it('does not bound the batch size itself', () => {
      const targets = Array.from({ length: 500 }, (_, i) => `u${i}`);
      expect(removeFollowersSchema.safeParse({ targets }).success).toBe(true);
    });
  });
});
