import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
    OUTPUT_STORE,
    OutputIndexSchema,
    StoredOutputSchema,
    type OutputIndex,
    type StoredOutput,
} from '@gst-summarizer/shared';

/**
 * Token → saved output registry.
 * Passed explicitly to whatever serves downloads; there is no global instance.
 */
export interface OutputStore {
    put(record: StoredOutput): Promise<void>;
    get(token: string): Promise<StoredOutput | null>;
    purge(olderThan: Date): Promise<string[]>;
}

/**
 * Output store backed by a directory: one {token}.xlsx per output plus index.json.
 */
export class FileOutputStore implements OutputStore {
    readonly root: string;
    private readonly now: () => Date;

    constructor(root: string, now: () => Date = () => new Date()) {
        this.root = root;
        this.now = now;
    }

    get indexPath(): string {
        return join(this.root, OUTPUT_STORE.INDEX_FILE);
    }

    /**
     * Write an output file under a fresh token and register it.
     */
    async save(originalName: string, content: Uint8Array, inputHash?: string): Promise<StoredOutput> {
        await mkdir(this.root, { recursive: true });

        const token = createToken();
        const path = join(this.root, `${token}.xlsx`);
        await writeFile(path, content);

        const record: StoredOutput = {
            token,
            path,
            original_name: originalName,
            created_at: this.now().toISOString(),
            input_hash: inputHash,
        };
        await this.put(record);
        return record;
    }

    async put(record: StoredOutput): Promise<void> {
        const index = await this.readIndex();
        index[record.token] = StoredOutputSchema.parse(record);
        await this.writeIndex(index);
    }

    /**
     * Look up a token. Records whose file has disappeared count as expired.
     */
    async get(token: string): Promise<StoredOutput | null> {
        const index = await this.readIndex();
        const record = index[token];
        if (!record || !existsSync(record.path)) {
            return null;
        }
        return record;
    }

    /**
     * Drop records created before `olderThan`, and records whose file is gone.
     * Returns the purged tokens.
     */
    async purge(olderThan: Date): Promise<string[]> {
        const index = await this.readIndex();
        const purged: string[] = [];

        for (const [token, record] of Object.entries(index)) {
            const expired = new Date(record.created_at).getTime() < olderThan.getTime();
            if (expired || !existsSync(record.path)) {
                await rm(record.path, { force: true });
                delete index[token];
                purged.push(token);
            }
        }

        if (purged.length > 0) {
            await this.writeIndex(index);
        }
        return purged;
    }

    /**
     * Purge relative to the store clock.
     */
    async purgeOlderThanMinutes(minutes: number): Promise<string[]> {
        return this.purge(new Date(this.now().getTime() - minutes * 60_000));
    }

    /**
     * A missing or unreadable index reads as empty.
     */
    private async readIndex(): Promise<OutputIndex> {
        let content: string;
        try {
            content = await readFile(this.indexPath, 'utf-8');
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') {
                return {};
            }
            throw err;
        }

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch {
            return {};
        }
        const parsed = OutputIndexSchema.safeParse(data);
        return parsed.success ? parsed.data : {};
    }

    private async writeIndex(index: OutputIndex): Promise<void> {
        await mkdir(this.root, { recursive: true });
        await writeFile(this.indexPath, JSON.stringify(index, null, 2));
    }
}

/**
 * Opaque download token: random UUID as 32 hex characters.
 */
export function createToken(): string {
    return randomUUID().replace(/-/g, '');
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
