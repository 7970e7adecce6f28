import { ExclusiveLock, mapWithConcurrency } from './concurrency.util';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('mapWithConcurrency', () => {
  it('keeps at most `limit` workers in flight and yields completion order', async () => {
    const gates = new Map(['a', 'b', 'c'].map((item) => [item, deferred<string>()]));
    const started: string[] = [];
    const reported: string[] = [];

    const all = mapWithConcurrency(
      ['a', 'b', 'c'],
      2,
      (item) => {
        started.push(item);
        return gates.get(item)?.promise ?? Promise.resolve(item);
      },
      (result) => reported.push(result),
    );

    await flush();
    expect(started).toEqual(['a', 'b']);

    gates.get('b')?.resolve('b');
    await flush();
    expect(started).toEqual(['a', 'b', 'c']);

    gates.get('c')?.resolve('c');
    gates.get('a')?.resolve('a');

    await expect(all).resolves.toEqual(['b', 'c', 'a']);
    expect(reported).toEqual(['b', 'c', 'a']);
  });

  it('returns an empty list for no items', async () => {
    const worker = jest.fn();

    await expect(mapWithConcurrency([], 3, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});

describe('ExclusiveLock', () => {
  it('keeps the chain alive after a failing task', async () => {
    const lock = new ExclusiveLock();

    await expect(
      lock.runExclusive(() => Promise.reject(new Error('failed'))),
    ).rejects.toThrow('failed');
    await expect(lock.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
