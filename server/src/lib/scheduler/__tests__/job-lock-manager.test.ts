import { JobLockManager } from '../job-lock-manager';

describe('JobLockManager', () => {
  it('should return the result when the lock is free', async () => {
    const locks = new JobLockManager();

    await expect(locks.processWithLock('translate', async () => 42)).resolves.toEqual({ acquired: true, result: 42 });
    expect(locks.isHeld('translate')).toBe(false);
  });

  it('should skip a second run of the same job while the first holds the lock', async () => {
    const locks = new JobLockManager();
    let release: () => void = () => undefined;
    const first = locks.processWithLock('translate', () => new Promise<void>(resolve => { release = resolve; }));

    expect(locks.isHeld('translate')).toBe(true);
    await expect(locks.processWithLock('translate', async () => 'second')).resolves.toEqual({
      acquired: false,
      reason: 'Job translate is already running'
    });
    await expect(locks.processWithLock('summarize', async () => 'other')).resolves.toEqual({ acquired: true, result: 'other' });

    release();
    await first;
    expect(locks.isHeld('translate')).toBe(false);
  });

  it('should release the lock when the job throws', async () => {
    const locks = new JobLockManager();

    await expect(locks.processWithLock('translate', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(locks.isHeld('translate')).toBe(false);
  });
});
