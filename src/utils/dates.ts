const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

/**
 * Format a date the way the scoping prompts expect it, in local time.
 *
 * @example
 *   getTodayStr(new Date(2026, 9, 18)) // → "Sun Oct 18, 2026"
 */
export function getTodayStr(date: Date = new Date()): string {
  const weekday = WEEKDAYS[date.getDay()];
  const month = MONTHS[date.getMonth()];
  return `${weekday} ${month} ${date.getDate()}, ${date.getFullYear()}`;
}
