import { readFile } from "node:fs/promises";
import jwt from "jsonwebtoken";

// Google service-account auth (JWT bearer grant) + Drive/Sheets REST
const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
export const SHEETS_API_BASE = "https://sheets.googleapis.com/v4/spreadsheets";

const SHEETS_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive.readonly",
].join(" ");

// Refresh a little before Google's expiry
const TOKEN_REFRESH_MARGIN_MS = 60_000;

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

interface GoogleTokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
}

interface DriveFileList {
  files?: Array<{ id: string; name: string }>;
}

interface ValueRangeResponse {
  range?: string;
  values?: string[][];
}

interface BatchUpdateResponse {
  totalUpdatedCells?: number;
}

export interface CellUpdate {
  range: string;
  value: string;
}

function getConfig() {
  const credentialsPath = process.env.GOOGLE_SERVICE_ACCOUNT_FILE;
  const spreadsheetName = process.env.GOOGLE_SPREADSHEET_NAME;

  if (!credentialsPath || !spreadsheetName) {
    throw new Error(
      "Missing Google Sheets configuration. Set GOOGLE_SERVICE_ACCOUNT_FILE and GOOGLE_SPREADSHEET_NAME"
    );
  }

  return {
    credentialsPath,
    spreadsheetName,
    sheetName: process.env.GOOGLE_SHEET_NAME || "Sheet1",
  };
}

export async function loadServiceAccount(path: string): Promise<ServiceAccountCredentials> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  if (
    typeof raw !== "object" ||
    raw === null ||
    !("client_email" in raw) ||
    !("private_key" in raw) ||
    typeof raw.client_email !== "string" ||
    typeof raw.private_key !== "string"
  ) {
    throw new Error(`Service account file ${path} is missing client_email or private_key`);
  }
  return { client_email: raw.client_email, private_key: raw.private_key };
}

export class GoogleSheetsClient {
  private accessToken: string | null = null;
  private expiresAt = 0;

  constructor(private readonly credentials: ServiceAccountCredentials) {}

  static async fromEnv(): Promise<{ client: GoogleSheetsClient; spreadsheetName: string; sheetName: string }> {
    const config = getConfig();
    const credentials = await loadServiceAccount(config.credentialsPath);
    return {
      client: new GoogleSheetsClient(credentials),
      spreadsheetName: config.spreadsheetName,
      sheetName: config.sheetName,
    };
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
      return this.accessToken;
    }

    const assertion = jwt.sign(
      { scope: SHEETS_SCOPES },
      this.credentials.private_key,
      {
        algorithm: "RS256",
        issuer: this.credentials.client_email,
        audience: GOOGLE_TOKEN_URL,
        expiresIn: 3600,
      }
    );

    const response = await fetch(GOOGLE_TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
        assertion,
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Failed to obtain Google access token: ${error}`);
    }

    const data: GoogleTokenResponse = await response.json();
    this.accessToken = data.access_token;
    this.expiresAt = Date.now() + data.expires_in * 1000;
    return data.access_token;
  }

  private async request<T>(url: string, init: { method?: string; body?: string } = {}): Promise<T> {
    const token = await this.getAccessToken();
    const response = await fetch(url, {
      ...init,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Google API request failed (${response.status}): ${error}`);
    }

    const data: T = await response.json();
    return data;
  }

  async findSpreadsheetIdByName(name: string): Promise<string | null> {
    const escaped = name.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
    const query = new URLSearchParams({
      q: `mimeType='application/vnd.google-apps.spreadsheet' and name='${escaped}'`,
      fields: "files(id,name)",
      pageSize: "10",
    });

    const data = await this.request<DriveFileList>(`${DRIVE_FILES_URL}?${query}`);
    return data.files?.[0]?.id ?? null;
  }

  async getValues(spreadsheetId: string, range: string): Promise<string[][]> {
    const data = await this.request<ValueRangeResponse>(
      `${SHEETS_API_BASE}/${spreadsheetId}/values/${encodeURIComponent(range)}`
    );
    return data.values ?? [];
  }

  /** Write several single cells in one call. Returns the number of cells Google updated. */
  async batchUpdateValues(spreadsheetId: string, updates: CellUpdate[]): Promise<number> {
    if (updates.length === 0) return 0;

    const data = await this.request<BatchUpdateResponse>(
      `${SHEETS_API_BASE}/${spreadsheetId}/values:batchUpdate`,
      {
        method: "POST",
        body: JSON.stringify({
          valueInputOption: "USER_ENTERED",
          data: updates.map((u) => ({ range: u.range, values: [[u.value]] })),
        }),
      }
    );
    return data.totalUpdatedCells ?? 0;
  }
}
