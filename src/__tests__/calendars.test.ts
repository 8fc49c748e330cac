import { isSupportedTimeZone, resolveCalendar } from '../common/calendars';

const OCTOBER_18_2024 = Date.UTC(2024, 9, 18, 12);

describe('calendar converters', () => {
  it('labels Gregorian year and month', () => {
    expect(resolveCalendar('gregorian').convert(OCTOBER_18_2024)).toEqual({
      year: 2024,
      month: 10,
      label: '2024-10',
    });
  });

  it('labels Persian (Solar Hijri) year and month', () => {
    const persian = resolveCalendar('persian');
    expect(persian.convert(OCTOBER_18_2024)).toEqual({ year: 1403, month: 7, label: '1403-07' });
    expect(persian.convert(Date.UTC(2024, 2, 10, 12)).label).toBe('1402-12');
  });

  it('depends on the configured time zone, not the host', () => {
    const lateNewYearsEve = Date.UTC(2023, 11, 31, 23, 30);
    expect(resolveCalendar('gregorian', 'UTC').convert(lateNewYearsEve).label).toBe('2023-12');
    expect(resolveCalendar('gregorian', 'Asia/Tehran').convert(lateNewYearsEve).label).toBe('2024-01');
  });

  it('builds both calendars for the default time zone', () => {
    expect(() => resolveCalendar('gregorian')).not.toThrow();
    expect(resolveCalendar('gregorian', 'UTC')).toMatchObject({ id: 'gregorian', timeZone: 'UTC' });
    expect(resolveCalendar('persian', 'UTC')).toMatchObject({ id: 'persian', timeZone: 'UTC' });
  });

  it('checks time zones on their own', () => {
    expect(isSupportedTimeZone('UTC')).toBe(true);
    expect(isSupportedTimeZone('Asia/Tehran')).toBe(true);
    expect(isSupportedTimeZone('Mars/Olympus_Mons')).toBe(false);
  });

  it('rejects unknown calendars and time zones', () => {
    expect(() => resolveCalendar('mayan')).toThrow('Unsupported calendar "mayan"');
    expect(() => resolveCalendar('gregorian', 'Mars/Olympus_Mons')).toThrow(
      'Unsupported time zone "Mars/Olympus_Mons"',
    );
  });

  it('rejects invalid timestamps', () => {
    expect(() => resolveCalendar('gregorian').convert(Number.NaN)).toThrow(RangeError);
  });
});
