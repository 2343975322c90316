import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_FILENAME } from '@casetree/shared';

/**
 * Searches for casetree.config.yaml.
 * Starts at startPath and bubbles up to the filesystem root.
 */
export function detectConfigPath(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CONFIG_FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
