import { describe, expect, it, vi } from 'vitest';
import { joinAll, joinBoth } from '../src/sync/join';
import type { SyncLogger } from '../src/sync/types';

function spyLogger() {
  const error = vi.fn();
  const logger: SyncLogger = { error, warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  return { logger, error };
}

describe('joinAll', () => {
  it('returns values in task order', async () => {
    const { logger } = spyLogger();

    await expect(joinAll([Promise.resolve(1), Promise.resolve(2)], logger, 'test')).resolves.toEqual([
      1, 2,
    ]);
  });

  it('waits for every sibling before rethrowing the first failure', async () => {
    const { logger, error } = spyLogger();
    let finished = false;
    const slow = new Promise<number>((resolve) =>
      setTimeout(() => {
        finished = true;
        resolve(3);
      }, 10),
    );

    await expect(
      joinAll(
        [Promise.reject(new Error('first')), slow, Promise.reject(new Error('second'))],
        logger,
        'test',
      ),
    ).rejects.toThrow('first');

    expect(finished).toBe(true);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('Sibling task failed after the first error');
  });
});

describe('joinBoth', () => {
  it('returns both values', async () => {
    const { logger } = spyLogger();

    await expect(joinBoth(Promise.resolve('a'), Promise.resolve(1), logger, 'test')).resolves.toEqual(
      ['a', 1],
    );
  });

  it('prefers the first failure and logs the second', async () => {
    const { logger, error } = spyLogger();

    await expect(
      joinBoth(Promise.reject(new Error('one')), Promise.reject(new Error('two')), logger, 'test'),
    ).rejects.toThrow('one');
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('rethrows a failure of the second task', async () => {
    const { logger } = spyLogger();

    await expect(
      joinBoth(Promise.resolve('a'), Promise.reject(new Error('two')), logger, 'test'),
    ).rejects.toThrow('two');
  });
});
