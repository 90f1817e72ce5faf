/**
 * Converts user-local times with a fixed UTC offset into absolute dispatch instants.
 * Pure functions: the current time is always passed in.
 */

import { addHours, addMinutes, isBefore, subMinutes } from 'date-fns';
import { ValidationError } from './errors';
import {
  dateTimeSchema,
  timeOfDaySchema,
  ValidationUtils,
} from './validation';

export type LocalTime =
  | { kind: 'now' }
  | { kind: 'timeOfDay'; hours: number; minutes: number }
  | {
      kind: 'dateTime';
      year: number;
      month: number; // 1-12
      day: number;
      hours: number;
      minutes: number;
    };

export interface LocalParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
}

const NOW_KEYWORDS = new Set(['now', 'сейчас']);

export const parseOffset = (offset: string): number =>
  ValidationUtils.parseOffset(offset);

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Accepts "now", "HH:MM" or "DD.MM.YYYY HH:MM"
 */
export function parseTimeInput(input: string): LocalTime {
  const text = input.trim().replace(/\s+/g, ' ');

  if (NOW_KEYWORDS.has(text.toLowerCase())) {
    return { kind: 'now' };
  }

  if (timeOfDaySchema.safeParse(text).success) {
    const [hours, minutes] = text.split(':').map(Number);
    return { kind: 'timeOfDay', hours, minutes };
  }

  if (dateTimeSchema.safeParse(text).success) {
    const [datePart, timePart] = text.split(' ');
    const [day, month, year] = datePart.split('.').map(Number);
    const [hours, minutes] = timePart.split(':').map(Number);
    const candidate = new Date(Date.UTC(year, month - 1, day));
    if (
      candidate.getUTCFullYear() !== year ||
      candidate.getUTCMonth() !== month - 1 ||
      candidate.getUTCDate() !== day
    ) {
      throw new ValidationError(`Invalid date: ${datePart}`, 'INVALID_TIME');
    }
    return { kind: 'dateTime', year, month, day, hours, minutes };
  }

  throw new ValidationError(
    'Invalid time format, use HH:MM or DD.MM.YYYY HH:MM',
    'INVALID_TIME',
  );
}

/**
 * Local wall-clock time -> UTC instant.
 * A bare time of day means its next occurrence at or after `nowUtc`.
 */
export function resolveDispatchInstant(
  localTime: LocalTime,
  offsetMinutes: number,
  nowUtc: Date,
): Date {
  switch (localTime.kind) {
    case 'now':
      return new Date(nowUtc.getTime());
    case 'timeOfDay': {
      const today = toLocalTime(nowUtc, offsetMinutes);
      const candidate = fromLocalParts(
        {
          year: today.year,
          month: today.month,
          day: today.day,
          hours: localTime.hours,
          minutes: localTime.minutes,
        },
        offsetMinutes,
      );
      // Fixed offsets have no DST, so the next day is always 24h later
      return isBefore(candidate, nowUtc) ? addHours(candidate, 24) : candidate;
    }
    case 'dateTime':
      return fromLocalParts(localTime, offsetMinutes);
  }
}

export function fromLocalParts(parts: LocalParts, offsetMinutes: number): Date {
  const asUtc = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hours, parts.minutes),
  );
  return subMinutes(asUtc, offsetMinutes);
}

export function toLocalTime(instant: Date, offsetMinutes: number): LocalParts {
  const shifted = addMinutes(instant, offsetMinutes);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hours: shifted.getUTCHours(),
    minutes: shifted.getUTCMinutes(),
  };
}

/**
 * "HH:MM DD.MM.YYYY" in the given offset
 */
export function formatLocal(instant: Date, offsetMinutes: number): string {
  const local = toLocalTime(instant, offsetMinutes);
  return `${pad(local.hours)}:${pad(local.minutes)} ${pad(local.day)}.${pad(local.month)}.${local.year}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
