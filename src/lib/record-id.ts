import { createHash, randomBytes } from 'crypto';

/**
 * Epic key reduced to characters safe in file and directory names
 */
export function safeKey(epicKey: string): string {
  return epicKey.replace(/[^A-Za-z0-9._-]+/g, '-');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function compactTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Identifier of the form `<epic>_<yyyymmdd_hhmmss>_<hash8>`; sorts by creation time within an epic
 */
export function generateRecordId(epicKey: string, now: Date = new Date()): string {
  const hash = createHash('sha256')
    .update(`${epicKey}:${now.toISOString()}:${randomBytes(8).toString('hex')}`)
    .digest('hex')
    .slice(0, 8);
  return `${safeKey(epicKey)}_${compactTimestamp(now)}_${hash}`;
}
