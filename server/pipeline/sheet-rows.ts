import { GoogleSheetsClient } from "../lib/google-sheets.js";
import { formatUtcStamp } from "../utils/dates.js";

export const PROJECT_NAME_HEADER = "Project Name";
export const IMPORTED_HEADER = "Imported";
export const VIDEO_HEADERS = [
  "Video 1",
  "Video 2",
  "Video 3",
  "Video 4",
  "Video 5",
  "Video 6",
  "Video 7",
] as const;

/** One project row from the spreadsheet. `rowNumber` is the 1-based sheet row. */
export interface SheetRow {
  rowNumber: number;
  projectName: string;
  videoUrls: string[];
}

/** Row source behind the import step. */
export interface SheetRowSource {
  getUnimportedRows(): Promise<SheetRow[]>;
  /** Returns the number of cells written. */
  markRowsImported(rowNumbers: number[]): Promise<number>;
}

/** 0 -> A, 25 -> Z, 26 -> AA */
export function columnLetter(index: number): string {
  let n = index + 1;
  let letters = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

function cell(row: string[], headers: string[], name: string): string {
  const index = headers.indexOf(name);
  if (index < 0 || index >= row.length) return "";
  return (row[index] ?? "").trim();
}

/**
 * Turn raw sheet values (header row first) into unimported project rows.
 * Fully blank rows and rows with an Imported marker are skipped.
 */
export function parseUnimportedRows(values: string[][]): SheetRow[] {
  if (values.length < 2) return [];

  const headers = values[0].map((h) => h.trim());
  const rows: SheetRow[] = [];

  values.slice(1).forEach((row, i) => {
    if (row.every((value) => !value || !value.trim())) return;
    if (cell(row, headers, IMPORTED_HEADER)) return;

    rows.push({
      rowNumber: i + 2,
      projectName: cell(row, headers, PROJECT_NAME_HEADER),
      videoUrls: VIDEO_HEADERS.map((h) => cell(row, headers, h)),
    });
  });

  return rows;
}

export class GoogleSheetRowSource implements SheetRowSource {
  private headers: string[] = [];

  constructor(
    private readonly client: GoogleSheetsClient,
    private readonly spreadsheetId: string,
    private readonly sheetName: string
  ) {}

  static async fromEnv(): Promise<GoogleSheetRowSource> {
    const { client, spreadsheetName, sheetName } = await GoogleSheetsClient.fromEnv();
    const spreadsheetId = await client.findSpreadsheetIdByName(spreadsheetName);
    if (!spreadsheetId) {
      throw new Error(`Spreadsheet '${spreadsheetName}' not found`);
    }
    return new GoogleSheetRowSource(client, spreadsheetId, sheetName);
  }

  async getUnimportedRows(): Promise<SheetRow[]> {
    const values = await this.client.getValues(this.spreadsheetId, `${this.sheetName}!A:Z`);
    this.headers = (values[0] ?? []).map((h) => h.trim());
    return parseUnimportedRows(values);
  }

  async markRowsImported(rowNumbers: number[]): Promise<number> {
    if (rowNumbers.length === 0) return 0;

    if (this.headers.length === 0) {
      const [headerRow] = await this.client.getValues(this.spreadsheetId, `${this.sheetName}!1:1`);
      this.headers = (headerRow ?? []).map((h) => h.trim());
    }

    const column = this.headers.indexOf(IMPORTED_HEADER);
    if (column < 0) {
      console.warn(`[Sheets] No '${IMPORTED_HEADER}' column found; rows left unmarked`);
      return 0;
    }

    const stamp = formatUtcStamp(new Date());
    const letter = columnLetter(column);
    return this.client.batchUpdateValues(
      this.spreadsheetId,
      rowNumbers.map((row) => ({ range: `${this.sheetName}!${letter}${row}`, value: stamp }))
    );
  }
}
