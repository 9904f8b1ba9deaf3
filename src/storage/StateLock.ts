import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';
import { StateLockError, errnoCode } from '../download/core/errors';

export const LOCK_FILE = '.lock';

/**
 * StateLock - Single-writer guard for a state directory
 * The lock file holds the owner's pid; a lock whose owner is gone is stale.
 */
export class StateLock {
    private readonly lockPath: string;
    private held = false;

    constructor(stateDirectory: string) {
        this.lockPath = path.join(stateDirectory, LOCK_FILE);
    }

    get isHeld(): boolean {
        return this.held;
    }

    async acquire(): Promise<void> {
        if (this.held) return;

        if (await this.tryCreate()) {
            this.held = true;
            return;
        }

        const ownerPid = await this.readOwner();
        if (ownerPid !== undefined && isProcessAlive(ownerPid)) {
            throw new StateLockError(this.lockPath, ownerPid);
        }

        logger.warn('Removing stale state lock', { path: this.lockPath, ownerPid });
        await fs.rm(this.lockPath, { force: true });

        if (!(await this.tryCreate())) {
            throw new StateLockError(this.lockPath, await this.readOwner());
        }
        this.held = true;
    }

    async release(): Promise<void> {
        if (!this.held) return;
        this.held = false;
        await fs.rm(this.lockPath, { force: true });
    }

    /**
     * Run an operation while holding the lock
     */
    async withLock<T>(operation: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await operation();
        } finally {
            await this.release();
        }
    }

    private async tryCreate(): Promise<boolean> {
        try {
            const handle = await fs.open(this.lockPath, 'wx');
            try {
                await handle.writeFile(`${process.pid}\n`, 'utf-8');
            } finally {
                await handle.close();
            }
            return true;
        } catch (error: unknown) {
            if (errnoCode(error) === 'EEXIST') {
                return false;
            }
            throw error;
        }
    }

    private async readOwner(): Promise<number | undefined> {
        try {
            const content = await fs.readFile(this.lockPath, 'utf-8');
            const pid = parseInt(content.trim(), 10);
            return Number.isInteger(pid) && pid > 0 ? pid : undefined;
        } catch {
            return undefined;
        }
    }
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error: unknown) {
        // EPERM: the process exists but belongs to someone else
        return errnoCode(error) === 'EPERM';
    }
}
