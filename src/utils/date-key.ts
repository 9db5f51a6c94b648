export type DateKeyFormat = 'DD/MM/YYYY' | 'YYYY-MM-DD';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format the local calendar date used as a row key in column A
 */
export function formatDateKey(date: Date, format: DateKeyFormat): string {
  const day = pad(date.getDate());
  const month = pad(date.getMonth() + 1);
  const year = String(date.getFullYear());

  switch (format) {
    case 'DD/MM/YYYY':
      return `${day}/${month}/${year}`;
    case 'YYYY-MM-DD':
      return `${year}-${month}-${day}`;
  }
}

/**
 * Parse a `YYYY-MM-DD` argument as local midnight
 */
export function parseDateArg(value: string): Date {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid date format: ${value}. Use YYYY-MM-DD`);
  }

  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new Error(`Invalid date: ${value}`);
  }
  return date;
}
