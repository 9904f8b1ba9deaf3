import fs from 'fs/promises';
import path from 'path';
import { LOCK_FILE, StateLock } from '../src/storage/StateLock';
import { StateLockError } from '../src/download/core/errors';
import { makeTempDir, removeDir } from './helpers/fakes';

describe('StateLock', () => {
  let stateDir: string;
  let lockPath: string;

  beforeEach(async () => {
    stateDir = await makeTempDir();
    lockPath = path.join(stateDir, LOCK_FILE);
  });

  afterEach(async () => {
    await removeDir(stateDir);
  });

  it('should write the owner pid and remove the file on release', async () => {
    const lock = new StateLock(stateDir);

    await lock.acquire();
    expect(lock.isHeld).toBe(true);
    expect(await fs.readFile(lockPath, 'utf-8')).toBe(`${process.pid}\n`);

    await lock.release();
    expect(lock.isHeld).toBe(false);
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it('should refuse a second holder while the owner is alive', async () => {
    const first = new StateLock(stateDir);
    await first.acquire();

    const second = new StateLock(stateDir);
    await expect(second.acquire()).rejects.toBeInstanceOf(StateLockError);
    await expect(second.acquire()).rejects.toMatchObject({ ownerPid: process.pid });

    await first.release();
  });

  it('should take over a lock left by a process that is gone', async () => {
    await fs.writeFile(lockPath, '2147483646\n');

    const lock = new StateLock(stateDir);
    await lock.acquire();

    expect(await fs.readFile(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    await lock.release();
  });

  it('should take over a lock file without a pid', async () => {
    await fs.writeFile(lockPath, 'garbage');

    const lock = new StateLock(stateDir);
    await expect(lock.acquire()).resolves.toBeUndefined();
    await lock.release();
  });

  it('should release after the operation, even when it fails', async () => {
    const lock = new StateLock(stateDir);

    await expect(lock.withLock(async () => 'done')).resolves.toBe('done');
    await expect(lock.withLock(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    expect(lock.isHeld).toBe(false);
    await expect(fs.access(lockPath)).rejects.toThrow();
  });
});
