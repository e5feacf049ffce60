import { parseClockTime } from './clock-time.util';

/**
 * True when the booked window [startMinutes, endMinutes) lies entirely inside
 * the ground's opening hours (HH:mm strings).
 */
export function isWithinBusinessHours(
  startMinutes: number,
  endMinutes: number,
  businessHours: { open: string; close: string },
): boolean {
  const open = parseClockTime(businessHours.open);
  const close = parseClockTime(businessHours.close);

  // No usable opening hours configured: treat the ground as open all day
  if (open === null || close === null || open >= close) {
    return endMinutes <= 24 * 60;
  }

  return (
    startMinutes < endMinutes && startMinutes >= open && endMinutes <= close
  );
}
