import type { CalendarSystem } from '../types/organizer';

export interface CalendarDate {
  year: number;
  month: number;
  /** Folder label, `YYYY-MM` */
  label: string;
}

export interface CalendarConverter {
  id: CalendarSystem;
  timeZone: string;
  convert: (timestampMs: number) => CalendarDate;
}

export const CALENDAR_SYSTEMS: readonly CalendarSystem[] = ['gregorian', 'persian'];

export const isCalendarSystem = (value: string): value is CalendarSystem =>
  CALENDAR_SYSTEMS.some((system) => system === value);

const pad = (value: number, width: number) => String(value).padStart(width, '0');

const readNumericPart = (parts: Intl.DateTimeFormatPart[], type: 'year' | 'month') => {
  const part = parts.find((candidate) => candidate.type === type);
  const numeric = part ? Number.parseInt(part.value, 10) : Number.NaN;
  if (!Number.isFinite(numeric)) {
    throw new Error(`Calendar formatter returned no ${type}`);
  }
  return numeric;
};

/** Unicode calendar identifiers (`-u-ca-` locale extension) */
const UNICODE_CALENDAR_IDS: Record<CalendarSystem, string> = {
  gregorian: 'gregory',
  persian: 'persian',
};

export const isSupportedTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format(0);
    return true;
  } catch (error: unknown) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
};

const createIntlConverter = (id: CalendarSystem, timeZone: string): CalendarConverter => {
  // Latin digits keep the folder names ASCII for every calendar.
  const formatter = new Intl.DateTimeFormat(`en-US-u-ca-${UNICODE_CALENDAR_IDS[id]}-nu-latn`, {
    year: 'numeric',
    month: 'numeric',
    timeZone,
  });

  return {
    id,
    timeZone,
    convert: (timestampMs) => {
      if (!Number.isFinite(timestampMs)) {
        throw new RangeError(`Invalid timestamp ${timestampMs}`);
      }
      const parts = formatter.formatToParts(new Date(timestampMs));
      const year = readNumericPart(parts, 'year');
      const month = readNumericPart(parts, 'month');
      return { year, month, label: `${pad(year, 4)}-${pad(month, 2)}` };
    },
  };
};

export const resolveCalendar = (id: string, timeZone = 'UTC'): CalendarConverter => {
  if (!isCalendarSystem(id)) {
    throw new Error(`Unsupported calendar "${id}" (expected one of ${CALENDAR_SYSTEMS.join(', ')})`);
  }
  if (!isSupportedTimeZone(timeZone)) {
    throw new Error(`Unsupported time zone "${timeZone}"`);
  }
  return createIntlConverter(id, timeZone);
};
