/** YYYY-MM-DD helpers; all arithmetic in UTC. */

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDaysIso(isoDate: string, days: number): string {
  const d = new Date(`${isoDate}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return toIsoDate(d);
}

/** Consecutive dates starting at startDate (default: today, UTC). */
export function planDates(count: number, startDate?: string | null): string[] {
  const start = startDate ?? toIsoDate(new Date());
  return Array.from({ length: count }, (_, i) => addDaysIso(start, i));
}
