import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

export function reasonFromCode(code:string | undefined) {
  const reason = code || 'UNKNOWN';
  const map:Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    ELOOP:  'symlink_loop',
    ENOTDIR:'not_a_directory',
    EISDIR: 'is_a_directory',
    ENOSPC: 'no_space_left'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error:unknown):string | undefined {
    if (typeof error === 'object'
      && error !== null && 'code' in error
      && typeof error.code === 'string'
    ) {
      return error.code;
    }
    return undefined;
}

/**
 * Write to a sibling temp file then rename over the target,
 * so a crash mid-write leaves the previous content in place.
 */
export async function writeFileAtomic(file:string, content:string):Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, content, 'utf-8');
    await fs.rename(tmp, file);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}
