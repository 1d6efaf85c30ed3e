const SECONDS_PER_DAY = 86400;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Convert a fractional year such as `1999.25` to a UTC date, to the second.
 * The fraction is spread over 366 days in leap years and 365 otherwise.
 */
export function fractionalYearToDate(fractionalYear: number): Date {
  const year = Math.trunc(fractionalYear);
  const dayCount = (fractionalYear - year) * (isLeapYear(year) ? 366 : 365);
  const day = Math.trunc(dayCount);
  const seconds = Math.round((dayCount - day) * SECONDS_PER_DAY);

  const yearStart = new Date(Date.UTC(year, 0, 1));
  // Date.UTC reads years 0-99 as 1900-1999.
  yearStart.setUTCFullYear(year);
  return new Date(yearStart.getTime() + (day * SECONDS_PER_DAY + seconds) * 1000);
}
