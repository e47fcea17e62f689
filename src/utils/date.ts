/**
 * Calendar date helpers. Dates travel as `YYYY-MM-DD` strings; only the
 * birthday window reads the local clock.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isCalendarDate = (value: string): boolean => {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
};

interface BirthdayWindow {
  fromMonth: number;
  toMonth: number;
  fromDay: number;
  toDay: number;
}

const BIRTHDAY_WINDOW_DAYS = 7;

/**
 * Month and day bounds of the upcoming-birthday query.
 *
 * The bounds are compared independently (month in [fromMonth, toMonth] and
 * day in [fromDay, toDay]), not as one date interval, so a window that
 * crosses a month end matches nothing whose day is below `fromDay`.
 */
export const birthdayWindow = (now: Date): BirthdayWindow => {
  const next = new Date(now.getTime());
  next.setDate(next.getDate() + BIRTHDAY_WINDOW_DAYS);

  return {
    fromMonth: now.getMonth() + 1,
    toMonth: next.getMonth() + 1,
    fromDay: now.getDate(),
    toDay: next.getDate(),
  };
};

export const matchesBirthdayWindow = (bdDate: string, window: BirthdayWindow): boolean => {
  const match = ISO_DATE.exec(bdDate);
  if (!match) return false;

  const month = Number(match[2]);
  const day = Number(match[3]);

  return (
    month >= window.fromMonth &&
    month <= window.toMonth &&
    day >= window.fromDay &&
    day <= window.toDay
  );
};
