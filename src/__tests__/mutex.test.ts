import { Mutex } from '../shared/utils/mutex';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('runs tasks one at a time in submission order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string, ms: number) => mutex.runExclusive(async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('keeps going after a task fails', async () => {
    const mutex = new Mutex();

    const failing = mutex.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
