import { ConfigurationError } from './errors.js';

const EPOCH_PATTERN = /^[+-]?\d+$/;
const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?: (\d{1,2}):(\d{1,2}):(\d{1,2}))?$/;

// parse epoch seconds, "YYYY-MM-DD" or "YYYY-MM-DD HH:MM:SS" (UTC) into epoch seconds
export function parseTime(str: string): number {
  const value = String(str).trim();

  if (EPOCH_PATTERN.test(value)) {
    return parseInt(value, 10);
  }

  const match = DATE_PATTERN.exec(value);
  if (match) {
    const [year, month, day, hours = 0, minutes = 0, seconds = 0] = match
      .slice(1)
      .map(part => (part === undefined ? undefined : parseInt(part, 10)));
    if (year !== undefined && month !== undefined && day !== undefined) {
      const ms = Date.UTC(year, month - 1, day, hours, minutes, seconds);
      const date = new Date(ms);

      // reject values Date.UTC silently rolls over, e.g. 2024-02-30 or 25:00:00
      if (
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day &&
        date.getUTCHours() === hours &&
        date.getUTCMinutes() === minutes &&
        date.getUTCSeconds() === seconds
      ) {
        return Math.floor(ms / 1000);
      }
    }
  }

  throw new ConfigurationError(`Invalid time: "${str}"`);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

// format epoch seconds as "YYYY-MM-DD HH:MM:SS -0000" in UTC
export function formatTime(epoch: number): string {
  const date = new Date(epoch * 1000);
  const ymd = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const hms = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${ymd} ${hms} -0000`;
}
