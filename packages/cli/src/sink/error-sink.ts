import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { ErrorKind } from '@casetree/shared';

/**
 * Append-only error CSV for one stage.
 *
 * Opening truncates any file left by a previous run. Each record is appended
 * before `record` resolves, so a crash mid-run leaves every earlier row on disk.
 * Rows are `subject,kind,detail` with no header.
 */
export class ErrorSink {
    private closed = false;
    private count = 0;

    private constructor(readonly path: string) {}

    static async open(path: string): Promise<ErrorSink> {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, '');
        return new ErrorSink(path);
    }

    async record(subject: string, kind: ErrorKind, detail: string): Promise<void> {
        if (this.closed) {
            throw new Error(`Error sink ${this.path} is closed`);
        }
        await appendFile(this.path, stringify([[subject, kind, detail]]));
        this.count++;
    }

    get written(): number {
        return this.count;
    }

    close(): void {
        this.closed = true;
    }
}
