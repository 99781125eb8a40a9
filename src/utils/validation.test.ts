import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { z } from 'zod';
import { RemoteBoxSchema } from '../schemas/setup.schemas';
import { safeParse, safeParseArray } from './validation';

describe('validation utilities', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('safeParse', () => {
    const RemoteSchema = z.object({
      url: z.string(),
      timeout: z.number(),
    });

    it('should return parsed data for valid input', () => {
      const validData = { url: 'http://remote.test', timeout: 30 };

      const result = safeParse(RemoteSchema, validData, null, 'TEST');

      expect(result).toEqual(validData);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should return fallback for invalid input', () => {
      const result = safeParse(RemoteSchema, { url: 'http://remote.test' }, null, 'TEST');

      expect(result).toBeNull();
      expect(warn).toHaveBeenCalledWith('[validation] TEST: unexpected shape', {
        issues: ['timeout: Required'],
      });
    });

    it('should label problems at the root', () => {
      safeParse(RemoteSchema, 'not an object', null, 'config.yaml');

      expect(warn).toHaveBeenCalledWith('[validation] config.yaml: unexpected shape', {
        issues: ['<root>: Expected object, received string'],
      });
    });

    it('should apply schema transforms', () => {
      const result = safeParse(RemoteBoxSchema, { id: 3 }, null, 'TEST');

      expect(result).toEqual({ id: '3', name: 'Unknown' });
    });

    it('should stay quiet when logging is silenced', () => {
      vi.stubEnv('LOG_LEVEL', 'error');

      safeParse(RemoteSchema, {}, null, 'TEST');

      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('safeParseArray', () => {
    it('should return parsed array for valid input', () => {
      const result = safeParseArray(RemoteBoxSchema, [{ id: 'a', name: 'A' }], 'TEST');

      expect(result).toEqual([{ id: 'a', name: 'A' }]);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should return empty array for null input', () => {
      const result = safeParseArray(RemoteBoxSchema, null, 'TEST');

      expect(result).toEqual([]);
      expect(warn).toHaveBeenCalledWith('[validation] TEST: received null/undefined, expected array');
    });

    it('should return empty array for non-array input', () => {
      expect(safeParseArray(RemoteBoxSchema, { id: 'a' }, 'TEST')).toEqual([]);
      expect(warn).toHaveBeenCalledWith('[validation] TEST: expected array, received object');
    });

    it('should keep valid items when others are invalid', () => {
      const result = safeParseArray(
        RemoteBoxSchema,
        [{ id: 'a', name: 'A' }, { name: 'no id' }, 'not an object', { id: 'b', name: 42 }],
        'TEST'
      );

      expect(result).toEqual([
        { id: 'a', name: 'A' },
        { id: 'b', name: 'Unknown' },
      ]);
      expect(warn).toHaveBeenCalledWith('[validation] TEST: skipped 2 invalid item(s)', {
        issues: ['[1] id: Invalid input', '[2] <root>: Expected object, received string'],
      });
    });

    it('should handle empty array', () => {
      expect(safeParseArray(RemoteBoxSchema, [], 'TEST')).toEqual([]);
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
