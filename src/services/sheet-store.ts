import { logger } from '../utils/logger.js';
import type { CellValue, DailyRow, SheetsClient } from '../types/sheet.js';

const log = logger.createContext('sheet-store');

/**
 * Column letter for a 1-based column index (1 -> A, 27 -> AA)
 */
export function columnLetter(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Column index must be a positive integer, got ${index}`);
  }

  let letters = '';
  let remaining = index;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * One worksheet holding one row per day: the date key in column A,
 * collected values from column B onwards.
 */
export class DailySheetStore {
  constructor(
    private client: SheetsClient,
    private worksheet: string
  ) {}

  private range(a1: string): string {
    return `${quoteSheetName(this.worksheet)}!${a1}`;
  }

  /**
   * Locate the row for a date key. A missing key maps to the first row after
   * the used part of column A.
   */
  async findRow(dateKey: string): Promise<DailyRow> {
    const columnA = (await this.client.getValues(this.range('A:A'))).map(row => (row[0] ?? '').trim());
    const index = columnA.indexOf(dateKey);

    if (index === -1) {
      log.debug(`${this.worksheet}: no row for ${dateKey}, next free row is ${columnA.length + 1}`);
      return { rowIndex: columnA.length + 1, exists: false, filled: false };
    }

    const rowIndex = index + 1;
    const cell = await this.client.getValues(this.range(`B${rowIndex}`));
    const filled = (cell[0]?.[0] ?? '').trim() !== '';
    log.debug(`${this.worksheet}: ${dateKey} is row ${rowIndex} (${filled ? 'filled' : 'empty'})`);
    return { rowIndex, exists: true, filled };
  }

  /**
   * Write the date key and values across one row in a single update
   */
  async writeRow(row: DailyRow, dateKey: string, values: CellValue[]): Promise<string> {
    const range = this.range(`A${row.rowIndex}:${columnLetter(values.length + 1)}${row.rowIndex}`);
    await this.client.updateValues(range, [[dateKey, ...values]]);
    log.verbose(`${this.worksheet}: wrote ${range}`);
    return range;
  }
}
