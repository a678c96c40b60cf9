export type SplitSuffix = 'B' | 'C';

/** YYYY-MM-DD of the given instant in the dispatch time zone */
export function formatCalendarDate(date: Date, timeZone: string): string {
  // en-CA renders as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).format(date);
}

/** YYYYMMDD of the given instant in the dispatch time zone */
export function formatCompactDate(date: Date, timeZone: string): string {
  return formatCalendarDate(date, timeZone).replace(/-/g, '');
}

export function buildVehicleConsecutive(region: string, compactDate: string, plate: string): string {
  return `${region}-${compactDate}-${plate}`;
}

export function buildIntegraConsecutive(region: string, compactDate: string, orderConsecutive: string): string {
  return `${region}-${compactDate}-${orderConsecutive}`;
}

/** Split children append the group letter with no separator */
export function withSplitSuffix(identifier: string, suffix: SplitSuffix): string {
  return `${identifier}${suffix}`;
}

/** Plates are compared without spaces or dashes: "ABC-123" and "abc 123" match */
export function normalizePlate(plate: string): string {
  return plate.toUpperCase().replace(/[\s-]+/g, '');
}
