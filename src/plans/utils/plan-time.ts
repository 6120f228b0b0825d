import { format } from "date-fns"

export const DISPLAY_DATE_FORMAT = "yyyy-MM-dd HH:mm"

/** `09:05:00` or `9:05` → `09:05`. */
export function formatClock(value: string): string {
  const [hours = "00", minutes = "00"] = value.split(":")
  return `${hours.padStart(2, "0")}:${minutes.padStart(2, "0")}`
}

/** Timestamp rendered in the server's local time zone. */
export function formatDisplayDate(value: Date): string {
  return format(value, DISPLAY_DATE_FORMAT)
}

export function isDayOfWeek(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= 1 && Number(value) <= 7
}
