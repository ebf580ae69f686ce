import fs from 'fs';
import path from 'path';

export interface RotateFileOptions {
  /** Directory where the file resides */
  dir: string;
  /** Base file name to rotate (e.g., lanlure.log) */
  filename: string;
  /** Retention period in days (default: 7) */
  retentionDays?: number;
  now?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Renames the file with the current date (once per day) and deletes rotated
 * copies older than the retention period. Returns the rotated path, if any.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  now = new Date(),
}: RotateFileOptions): string | undefined {
  const today = now.toISOString().split('T')[0];
  const ext = path.extname(filename);
  const base = path.basename(filename, ext);

  const sourcePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${today}${ext}`);

  let rotated: string | undefined;
  if (fs.existsSync(sourcePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(sourcePath, rotatedPath);
    rotated = rotatedPath;
  }

  const pattern = new RegExp(
    `^${escapeRegExp(base)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(ext)}$`,
  );
  const cutoff = now.getTime() - retentionDays * DAY_MS;

  for (const file of fs.readdirSync(dir)) {
    const match = file.match(pattern);
    if (!match) continue;
    const date = new Date(match[1]);
    if (!isNaN(date.getTime()) && date.getTime() < cutoff) {
      fs.unlinkSync(path.join(dir, file));
    }
  }

  return rotated;
}
