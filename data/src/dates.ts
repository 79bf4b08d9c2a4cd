const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Local calendar date of `d` as yyyy-MM-dd. */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

export function addDays(date: string, n: number): string {
  const parsed = parseCalendarDate(date);
  if (!parsed) throw new RangeError(`Not a calendar date: ${date}`);
  parsed.setDate(parsed.getDate() + n);
  return formatDate(parsed);
}

/**
 * Parses yyyy-MM-dd into a local Date at midnight. Returns null for anything
 * else, including dates that roll over such as 2024-02-30.
 */
export function parseCalendarDate(value: string): Date | null {
  const m = CALENDAR_DATE_RE.exec(value);
  if (!m) return null;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(year, month - 1, day);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return d;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}
