import { KeyedMutex } from './keyed-mutex';

describe('KeyedMutex', () => {
  it('runs jobs for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.run('a', async () => {
      order.push('a1:start');
      await gate;
      order.push('a1:end');
      return 1;
    });
    const second = mutex.run('a', async () => {
      order.push('a2');
      return 2;
    });
    const other = mutex.run('b', async () => {
      order.push('b');
      return 3;
    });

    await expect(other).resolves.toBe(3);
    expect(order).toEqual(['a1:start', 'b']);

    release();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['a1:start', 'b', 'a1:end', 'a2']);
  });

  it('keeps the queue moving after a job fails', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('k', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('reports idle once every key has drained', async () => {
    const mutex = new KeyedMutex();
    const done: string[] = [];

    void mutex.run('a', async () => {
      done.push('a');
    });
    void mutex.run('b', async () => {
      done.push('b');
    });

    await mutex.idle();
    expect(done.sort()).toEqual(['a', 'b']);
  });
});
