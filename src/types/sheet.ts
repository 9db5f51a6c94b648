export type CellValue = string | number;

/**
 * Minimal spreadsheet surface the collectors need; ranges are A1 notation
 * including the worksheet, e.g. `'Cap'!A:A`.
 */
export interface SheetsClient {
  getValues(range: string): Promise<string[][]>;
  updateValues(range: string, values: CellValue[][]): Promise<void>;
}

export interface DailyRow {
  rowIndex: number;   // 1-based sheet row
  exists: boolean;    // date key already present in column A
  filled: boolean;    // column B of that row holds a value
}
