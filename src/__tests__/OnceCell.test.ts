import { OnceCell } from '../utils/OnceCell';

describe('OnceCell', () => {
  it('should run the initializer once for concurrent callers', async () => {
    const cell = new OnceCell<number>();
    const init = jest.fn(async () => 42);

    const values = await Promise.all([cell.getOrInit(init), cell.getOrInit(init), cell.getOrInit(init)]);

    expect(values).toEqual([42, 42, 42]);
    expect(init).toHaveBeenCalledTimes(1);
    expect(cell.initialized).toBe(true);
  });

  it('should keep the first value', async () => {
    const cell = new OnceCell<string>();

    await cell.getOrInit(async () => 'first');

    await expect(cell.getOrInit(async () => 'second')).resolves.toBe('first');
  });

  it('should retry after a failed initialization', async () => {
    const cell = new OnceCell<string>();

    await expect(cell.getOrInit(async () => Promise.reject(new Error('not yet')))).rejects.toThrow('not yet');
    expect(cell.initialized).toBe(false);

    await expect(cell.getOrInit(async () => 'ready')).resolves.toBe('ready');
    expect(cell.initialized).toBe(true);
  });

  it('should share a failure with callers of the same attempt', async () => {
    const cell = new OnceCell<string>();
    const init = jest.fn(async () => Promise.reject(new Error('boom')));

    const results = await Promise.allSettled([cell.getOrInit(init), cell.getOrInit(init)]);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    expect(init).toHaveBeenCalledTimes(1);
  });
});
