/**
 * =============================================================================
 * JSON FILE STORE - Unit Tests
 * =============================================================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileStore } from '../shared/database/json-file.store';
import { DataFileCorruptedError, InternalError } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes to the first candidate and reads it back', async () => {
    const target = path.join(dir, 'nested', 'data.json');
    const store = new JsonFileStore('test', [target, path.join(dir, 'fallback.json')]);

    await store.write({ items: [1, 2] });

    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual({ items: [1, 2] });
    expect(fs.existsSync(`${target}.tmp`)).toBe(false);
    await expect(store.read()).resolves.toEqual({ path: target, data: { items: [1, 2] } });
  });

  it('skips an unparsable candidate unless strict', async () => {
    const broken = path.join(dir, 'broken.json');
    const good = path.join(dir, 'good.json');
    fs.writeFileSync(broken, '{ nope');
    fs.writeFileSync(good, '[1]');
    const store = new JsonFileStore('test', [broken, good]);

    await expect(store.read()).resolves.toEqual({ path: good, data: [1] });
    await expect(store.read({ strict: true })).rejects.toBeInstanceOf(DataFileCorruptedError);
  });

  it('removes the temp file when the final rename fails', async () => {
    const target = path.join(dir, 'data.json');
    // a directory at the target path makes the rename fail
    fs.mkdirSync(target);
    const store = new JsonFileStore('test', [target]);

    await expect(store.write({ items: [] })).rejects.toBeInstanceOf(InternalError);

    expect(fs.existsSync(`${target}.tmp`)).toBe(false);
    expect(fs.statSync(target).isDirectory()).toBe(true);
  });
});
