// business-hours.ts - Wall-clock window check in the configured timezone
import { BusinessHours } from '../config/config';

export interface BusinessHoursCheck {
  within: boolean;
  /** Current local time as HH:MM in the window's timezone. */
  localTime: string;
}

export function localClockTime(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(now);

  const hour = parts.find(p => p.type === 'hour')?.value ?? '00';
  const minute = parts.find(p => p.type === 'minute')?.value ?? '00';
  return `${hour}:${minute}`;
}

/**
 * True when `now` lies in `[start, end)`. A window whose end is earlier than
 * its start runs across midnight (e.g. 22:00-06:00).
 */
export function isWithinBusinessHours(now: Date, hours: BusinessHours): BusinessHoursCheck {
  const localTime = localClockTime(now, hours.timezone);

  // Zero-padded HH:MM strings order the same way as the times they name
  const within = hours.start <= hours.end
    ? localTime >= hours.start && localTime < hours.end
    : localTime >= hours.start || localTime < hours.end;

  return { within, localTime };
}
