const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Next `count` weekdays strictly after `date` (YYYY-MM-DD). Exchange holidays
 * are not modelled.
 */
export function nextWeekdays(date: string, count: number): string[] {
  const out: string[] = [];
  let ts = Date.parse(`${date}T00:00:00Z`);
  while (out.length < count) {
    ts += DAY_MS;
    const day = new Date(ts).getUTCDay();
    if (day !== 0 && day !== 6) out.push(new Date(ts).toISOString().slice(0, 10));
  }
  return out;
}
