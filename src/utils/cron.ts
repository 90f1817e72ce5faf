/**
 * Maps a fixed interval to a node-cron expression (seconds field enabled).
 * Returns null for periods a cron step cannot express, e.g. 45s or 7min.
 */
export function intervalToCronExpression(seconds: number): string | null {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    return null;
  }
  if (seconds < 60) {
    return 60 % seconds === 0 ? `*/${seconds} * * * * *` : null;
  }
  if (seconds % 60 !== 0) {
    return null;
  }
  const minutes = seconds / 60;
  if (minutes > 60 || 60 % minutes !== 0) {
    return null;
  }
  return minutes === 60 ? '0 0 * * * *' : `0 */${minutes} * * * *`;
}
