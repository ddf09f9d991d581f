/**
 * =============================================================================
 * GEOCACHE - Unit Tests
 * =============================================================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Geocache } from '../modules/geocache/geocache.service';
import { ValidationError } from '../core/errors/AppError';
import { logger } from '../shared/services/logger.service';

// Mock logger to suppress output during tests
jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('Geocache', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'geocache-'));
    jest.clearAllMocks();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeFile = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  describe('fromEntries', () => {
    it('looks up known keys and misses unknown ones', () => {
      const cache = Geocache.fromEntries({ Madhapur: [17.4483, 78.3915] });

      expect(cache.lookup('Madhapur')).toEqual([17.4483, 78.3915]);
      expect(cache.lookup('madhapur')).toBeUndefined();
      expect(cache.size).toBe(1);
      expect(cache.source).toBeNull();
    });

    it('rejects coordinates out of range', () => {
      expect(() => Geocache.fromEntries({ Nowhere: [91, 0] })).toThrow(ValidationError);
    });
  });

  describe('fromCandidates', () => {
    it('loads the first candidate that exists', () => {
      const first = writeFile('first.json', JSON.stringify({ A: [1, 2] }));
      const second = writeFile('second.json', JSON.stringify({ B: [3, 4] }));

      const cache = Geocache.fromCandidates([path.join(dir, 'missing.json'), first, second]);

      expect(cache.source).toBe(first);
      expect(cache.size).toBe(1);
      expect(cache.lookup('A')).toEqual([1, 2]);
      expect(cache.lookup('B')).toBeUndefined();
    });

    it('skips a candidate with invalid JSON and uses the next one', () => {
      const broken = writeFile('broken.json', '{ not json');
      const good = writeFile('good.json', JSON.stringify({ B: [3, 4] }));

      const cache = Geocache.fromCandidates([broken, good]);

      expect(cache.source).toBe(good);
      expect(cache.lookup('B')).toEqual([3, 4]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Geocache candidate unreadable, skipping',
        expect.objectContaining({ file: broken })
      );
    });

    it('skips a candidate whose values are not coordinate pairs', () => {
      const wrongShape = writeFile('shape.json', JSON.stringify({ A: 'somewhere' }));
      const good = writeFile('good.json', JSON.stringify({ B: [3, 4] }));

      const cache = Geocache.fromCandidates([wrongShape, good]);

      expect(cache.source).toBe(good);
    });

    it('falls back to an empty cache when nothing is usable', () => {
      const cache = Geocache.fromCandidates([path.join(dir, 'missing.json')]);

      expect(cache.size).toBe(0);
      expect(cache.source).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        'No geocache file found; all locations will be unroutable',
        expect.any(Object)
      );
    });
  });
});
