import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Root of the launcher package (the directory holding package.json and bin/)
 */
export function projectPath(): string {
    return resolve(dirname(fileURLToPath(import.meta.url)), '..');
}
