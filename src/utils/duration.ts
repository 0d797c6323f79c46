/**
 * Elapsed-time formatting
 */

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

export const DEFAULT_MIN_DAYS = 3;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function assertCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Formats a number of seconds as DDd:HHh:MMm:SSs.
 *
 * - Days appear only once there are at least `minDays` of them
 * - Hours appear only when there is at least one; without a days field the
 *   hour count is the total and can exceed 23
 * - Hours, minutes and seconds are two digits; days are not padded
 */
export function formatDuration(
  totalSeconds: number,
  minDays: number = DEFAULT_MIN_DAYS,
): string {
  assertCount("totalSeconds", totalSeconds);
  assertCount("minDays", minDays);

  const totalHours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const totalDays = Math.floor(totalSeconds / SECONDS_PER_DAY);

  if (totalDays >= minDays) {
    const rest = totalSeconds - totalDays * SECONDS_PER_DAY;
    return `${totalDays}d:${formatHhMmSs(rest)}`;
  }

  if (totalHours === 0) {
    return formatMmSs(totalSeconds);
  }
  return formatHhMmSs(totalSeconds);
}

function formatHhMmSs(seconds: number): string {
  const hours = Math.floor(seconds / SECONDS_PER_HOUR);
  return `${pad2(hours)}h:${formatMmSs(seconds % SECONDS_PER_HOUR)}`;
}

function formatMmSs(seconds: number): string {
  const minutes = Math.floor(seconds / SECONDS_PER_MINUTE) % 60;
  return `${pad2(minutes)}m:${pad2(seconds % SECONDS_PER_MINUTE)}s`;
}
