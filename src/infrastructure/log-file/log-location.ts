import { mkdir } from 'node:fs/promises';
import { homedir, platform } from 'node:os';
import { dirname, join } from 'node:path';
import { formatFileTimestamp } from '../../application/timestamps.js';
import { SinkWriter } from './sink-writer.js';

const APP_DIR = 'script-resolver';

/** Log directory relative to the user's home for each platform. */
export function logDirForPlatform(os: NodeJS.Platform): string {
  switch (os) {
    case 'darwin':
      return join('Library', 'Logs', APP_DIR);
    case 'win32':
      return join('Application Data', APP_DIR, 'log');
    default:
      return join(`.${APP_DIR}`, 'log');
  }
}

export function defaultLogDirectory(home: string = homedir(), os: NodeJS.Platform = platform()): string {
  return join(home, logDirForPlatform(os));
}

/** `resolver-yyyyMMdd-HHmmss-SSS.log` */
export function logFileName(createdAt: Date): string {
  return `resolver-${formatFileTimestamp(createdAt)}.log`;
}

/**
 * Creates the parent directory if absent, then opens the file for appending.
 * Failures propagate: the consumer run that asked for the file does not start.
 */
export async function openLogFile(path: string): Promise<SinkWriter> {
  await mkdir(dirname(path), { recursive: true });
  return SinkWriter.open(path);
}
