/**
 * Fixed-offset local time helpers (users live at UTC+7, no DST).
 */

export const LOCAL_UTC_OFFSET_HOURS = 7;

/** Hour of day (0-23) at the fixed local offset. */
export function localHour(at: Date, offsetHours: number = LOCAL_UTC_OFFSET_HOURS): number {
  return (at.getUTCHours() + offsetHours + 24) % 24;
}

/** `6` → `"06:00"`, the format stored in `reminder_times`. */
export function formatSlot(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

/** dd/MM/yyyy at the fixed local offset. */
export function formatLocalDate(at: Date, offsetHours: number = LOCAL_UTC_OFFSET_HOURS): string {
  const local = new Date(at.getTime() + offsetHours * 3_600_000);
  const d = String(local.getUTCDate()).padStart(2, '0');
  const m = String(local.getUTCMonth() + 1).padStart(2, '0');
  return `${d}/${m}/${local.getUTCFullYear()}`;
}
