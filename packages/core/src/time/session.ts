/**
 * Market session calendar.
 *
 * Wall-clock time is converted to the exchange time zone with Intl so DST is
 * handled without a date library. Trading days are Monday to Friday minus any
 * listed holidays; the regular session is the half-open window [open, close).
 */

export interface MarketHours {
  timezone: string;
  /** HH:MM, exchange local time */
  open: string;
  close: string;
  /** YYYY-MM-DD dates with no session */
  holidays?: readonly string[];
}

export type SessionPhase = 'pre_open' | 'open' | 'post_close' | 'non_trading_day';

export interface SessionState {
  /** YYYY-MM-DD in the exchange time zone */
  tradingDay: string;
  isTradingDay: boolean;
  isOpen: boolean;
  phase: SessionPhase;
  /** minutes since local midnight */
  minuteOfDay: number;
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

export function toMinutes(hhmm: string): number {
  const [h, m] = hhmm.split(':').map(Number);
  return h * 60 + m;
}

function localParts(date: Date, timeZone: string): { day: string; minuteOfDay: number; dayOfWeek: number } {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    weekday: 'short',
    hour12: false,
  });
  const parts = formatter.formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '0';
  const hour = parseInt(get('hour'), 10) % 24; // some runtimes print midnight as 24
  return {
    day: `${get('year')}-${get('month')}-${get('day')}`,
    minuteOfDay: hour * 60 + parseInt(get('minute'), 10),
    dayOfWeek: WEEKDAYS[get('weekday')] ?? 0,
  };
}

export function sessionAt(now: Date, hours: MarketHours): SessionState {
  const { day, minuteOfDay, dayOfWeek } = localParts(now, hours.timezone);
  const isTradingDay = dayOfWeek >= 1 && dayOfWeek <= 5 && !(hours.holidays ?? []).includes(day);
  const open = toMinutes(hours.open);
  const close = toMinutes(hours.close);

  let phase: SessionPhase;
  if (!isTradingDay) phase = 'non_trading_day';
  else if (minuteOfDay < open) phase = 'pre_open';
  else if (minuteOfDay < close) phase = 'open';
  else phase = 'post_close';

  return { tradingDay: day, isTradingDay, isOpen: phase === 'open', phase, minuteOfDay };
}
