import { KeyedMutex, Semaphore } from '../../lib/sync/semaphore';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('bounds the work in flight', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 1));
      active--;
    })));

    expect(peak).toBe(2);
  });

  it('releases the permit when the work fails', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(semaphore.run(async () => 'next')).resolves.toBe('next');
  });
});

describe('KeyedMutex', () => {
  it('runs work on one key in submission order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run('album:a1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = mutex.run('album:a1', async () => {
      order.push('second');
    });
    const other = mutex.run('album:a2', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['other']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['other', 'first', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('keeps going after a failure on the same key', async () => {
    const mutex = new KeyedMutex();

    const failed = mutex.run('tag:x', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('tag:x', async () => 'done');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });
});
