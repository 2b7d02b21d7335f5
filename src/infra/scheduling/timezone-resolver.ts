import { DateTime, IANAZone } from 'luxon';
import { InvalidWindowError, TimezoneError, UnknownTimezoneError } from '@/shared/errors';

export const DAY_FORMAT = 'yyyy-MM-dd';

export interface DeliveryWindow {
  windowStart: Date;
  windowEnd: Date;
}

export const isValidTimezone = (timezone: string): boolean => IANAZone.isValidZone(timezone);

export const isValidDay = (day: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(day) && DateTime.fromFormat(day, DAY_FORMAT, { zone: 'utc' }).isValid;

/**
 * Wall-clock hour on a local day. 24 is midnight at the start of the next day.
 * Hours that fall in a DST gap are shifted forward by luxon.
 */
const atLocalHour = (day: DateTime, hour: number): DateTime =>
  hour === 24
    ? day.plus({ days: 1 }).startOf('day')
    : day.set({ hour, minute: 0, second: 0, millisecond: 0 });

/**
 * Convert a subscriber's local delivery window on a calendar day to UTC instants.
 * Each endpoint is resolved against the zone rules in force at that wall-clock
 * time, so a window spanning a DST switch is shorter or longer than end - start hours.
 * A window that lies wholly inside a spring-forward gap resolves to nothing and is rejected.
 */
export const resolveDeliveryWindow = (
  timezone: string,
  startHour: number,
  endHour: number,
  onDate: string
): DeliveryWindow => {
  if (!isValidTimezone(timezone)) {
    throw new UnknownTimezoneError(timezone);
  }

  if (
    !Number.isInteger(startHour) ||
    !Number.isInteger(endHour) ||
    startHour < 0 ||
    endHour > 24 ||
    startHour >= endHour
  ) {
    throw new InvalidWindowError(startHour, endHour);
  }

  const day = DateTime.fromFormat(onDate, DAY_FORMAT, { zone: timezone });
  if (!day.isValid) {
    throw new TimezoneError(`Invalid date: ${onDate}`);
  }

  const windowStart = atLocalHour(day, startHour).toUTC().toJSDate();
  const windowEnd = atLocalHour(day, endHour).toUTC().toJSDate();
  if (windowEnd.getTime() <= windowStart.getTime()) {
    throw new InvalidWindowError(startHour, endHour);
  }

  return { windowStart, windowEnd };
};
