/**
 * CORE: Path Logic
 * Workspace layout and root discovery.
 */

import fs from 'fs-extra';
import path from 'path';
import os from 'os';

export const DATA_DIR = '.pathkeeper';
export const CONFIG_FILE = 'config.json';

/** Database file name only. Whitelist: alphanumeric, dot, hyphen, underscore. */
const DATABASE_NAME_REGEX = /^[a-zA-Z0-9_-][a-zA-Z0-9._-]*$/;
const MAX_DATABASE_NAME_LEN = 128;

export function validateDatabaseName(name: string): void {
    if (!DATABASE_NAME_REGEX.test(name) || name.includes('..')) {
        throw new Error(`Invalid database name '${name}': must be a plain file name`);
    }
    if (name.length > MAX_DATABASE_NAME_LEN) {
        throw new Error(`Invalid database name: length exceeds ${MAX_DATABASE_NAME_LEN} characters`);
    }
}

export function getDataDir(rootDir: string): string {
    return path.join(rootDir, DATA_DIR);
}

export function getConfigPath(rootDir: string): string {
    return path.join(rootDir, DATA_DIR, CONFIG_FILE);
}

export function getDatabasePath(rootDir: string, database: string): string {
    validateDatabaseName(database);
    return path.join(rootDir, DATA_DIR, database);
}

/**
 * Walk up from startDir to the first directory holding .pathkeeper/,
 * the way git finds .git. Stops below the filesystem root and the home directory.
 */
export function findRoot(startDir: string = process.cwd()): string | null {
    let current = path.resolve(startDir);
    const root = path.parse(current).root;
    const home = os.homedir();

    while (current !== root && current !== home) {
        const dataDir = getDataDir(current);
        if (fs.existsSync(dataDir) && fs.statSync(dataDir).isDirectory()) {
            return current;
        }
        current = path.dirname(current);
    }
    return null;
}
