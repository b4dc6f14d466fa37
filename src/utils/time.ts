export const MS_PER_SECOND = 1000;
export const MS_PER_HOUR = 60 * 60 * MS_PER_SECOND;

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:?\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** Day-of-month and hour in UTC, e.g. `2118`. */
export const formatDayHour = (timeMs: number): string => {
  const date = new Date(timeMs);
  return `${pad2(date.getUTCDate())}${pad2(date.getUTCHours())}`;
};

/** Day, hour and minute in UTC without a zone marker, e.g. `211800`. */
export const formatDayHourMinute = (timeMs: number): string =>
  `${formatDayHour(timeMs)}${pad2(new Date(timeMs).getUTCMinutes())}`;

/** Report issue time as printed in a bulletin, e.g. `210550Z`. */
export const formatIssueTime = (timeMs: number): string => `${formatDayHourMinute(timeMs)}Z`;
