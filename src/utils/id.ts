import { randomBytes } from 'node:crypto';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatSessionStamp(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Session ids name the log file, so two runs started in the same second
 * still get distinct files.
 */
export function generateSessionId(now: Date = new Date()): string {
  const rand = randomBytes(3).toString('hex');
  return `${formatSessionStamp(now)}_${rand}`;
}
