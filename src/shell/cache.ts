/**
 * SHELL: Build Cache
 * One-field record of the last branch that made it to the remote.
 * Writes are tmp+rename under a proper-lockfile lock on the cache path.
 */

import fs from 'fs-extra';
import path from 'path';
import lockfile from 'proper-lockfile';
import { z } from 'zod';

export const CacheRecordSchema = z.object({
    LastSuccessfulBranch: z.string(),
});

export type CacheRecord = z.infer<typeof CacheRecordSchema>;

export class BuildCache {
    private filePath: string;

    constructor(filePath: string) {
        this.filePath = path.resolve(filePath);
    }

    async save(branch: string): Promise<void> {
        await fs.ensureDir(path.dirname(this.filePath));

        // realpath: false lets us lock a cache file that does not exist yet
        const release = await lockfile.lock(this.filePath, {
            realpath: false,
            stale: 10 * 1000,
            retries: { retries: 5, minTimeout: 50, maxTimeout: 500 },
        });
        try {
            const record: CacheRecord = { LastSuccessfulBranch: branch };
            const tmpPath = this.filePath + '.tmp';
            await fs.writeJson(tmpPath, record, { spaces: 2 });
            await fs.move(tmpPath, this.filePath, { overwrite: true });
        } finally {
            await release();
        }
    }

    /** null for a missing, unreadable or malformed record. */
    async load(): Promise<string | null> {
        if (!(await fs.pathExists(this.filePath))) {
            return null;
        }

        let raw: unknown;
        try {
            raw = await fs.readJson(this.filePath);
        } catch {
            return null;
        }

        const parsed = CacheRecordSchema.safeParse(raw);
        return parsed.success ? parsed.data.LastSuccessfulBranch : null;
    }

    getPath(): string {
        return this.filePath;
    }
}
