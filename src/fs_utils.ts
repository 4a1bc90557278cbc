// src/fs_utils.ts

import * as fs from 'fs';
import * as path from 'path';

/** The errno code of a failed fs/process call, if there is one. */
export function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
    return undefined;
}

/** Total size of the regular files under `dir`; symlinks count as themselves. */
export function getDirectorySizeBytes(dir: string): number {
    let total = 0;
    const pending = [dir];
    while (pending.length > 0) {
        const current = pending.pop();
        if (current === undefined) break;
        for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
            const full = path.join(current, entry.name);
            if (entry.isDirectory()) pending.push(full);
            else total += fs.lstatSync(full).size;
        }
    }
    return total;
}
