import { join } from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { DateTime } from 'luxon';

export function at(iso:string, zone = 'UTC'): DateTime {
    const dt = DateTime.fromISO(iso, { zone });
    if (!dt.isValid) {
        throw new Error(`at(): unparseable ${iso} (${dt.invalidReason ?? 'unknown'})`);
    }
    return dt;
}

interface StoreFileOptions {
    version?: number;
    key?: string;
    data?: unknown;
}

export async function createStoreFile(baseDir:string, fileName:string, options:StoreFileOptions = {}) {
    const { version = 1, key = 'waterline.meter', data = {} } = options;
    await mkdir(baseDir, { recursive: true });
    const filePath = join(baseDir, fileName);
    await writeFile(filePath, JSON.stringify({ version, key, data }), 'utf8');
    return filePath;
}
