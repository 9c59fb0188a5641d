import { copyFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { format as formatDate } from 'date-fns';

/** `<stem>.backup_<YYYYMMDD_HHMMSS><suffix>` beside the original, in local time. */
export function backupPathFor(filePath: string, now: Date): string {
  const { dir, name, ext } = parse(filePath);
  const stamped = `${name}.backup_${formatDate(now, 'yyyyMMdd_HHmmss')}${ext}`;
  return join(dir, stamped);
}

/** Copy `filePath` byte for byte to its timestamped backup path and return that path. */
export async function backupFile(filePath: string, now: Date = new Date()): Promise<string> {
  const target = backupPathFor(filePath, now);
  await copyFile(filePath, target);
  return target;
}
