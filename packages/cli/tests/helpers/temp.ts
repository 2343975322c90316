import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

/**
 * Creates a fresh directory under the OS temp dir and removes it afterwards.
 */
export async function withTempDir(
    prefix: string,
    run: (root: string) => Promise<void>
): Promise<void> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    const realRoot = await fs.realpath(root);

    try {
        await run(realRoot);
    } finally {
        await fs.remove(realRoot);
    }
}

export async function writeFixtureFile(
    root: string,
    relativePath: string,
    content: string
): Promise<void> {
    const absolutePath = path.join(root, relativePath);
    await fs.ensureDir(path.dirname(absolutePath));
    await fs.writeFile(absolutePath, content, 'utf8');
}
