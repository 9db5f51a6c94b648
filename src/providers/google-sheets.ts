/**
 * Google Sheets Provider
 *
 * Reads and writes cell ranges through the Sheets REST API (v4),
 * authenticated as a service account.
 */

import { JWT } from 'google-auth-library';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { CellValue, SheetsClient } from '../types/sheet.js';

const log = logger.createContext('google-sheets');

const SHEETS_API_BASE = 'https://sheets.googleapis.com/v4/spreadsheets';
const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
}).passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

const ValueRangeSchema = z.object({
  range: z.string().optional(),
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String))).optional()
});

const handleApiResponse = async (response: Response): Promise<unknown> => {
  if (!response.ok) {
    let errorMessage = `Sheets API Error: ${response.status} ${response.statusText}`;
    const details = await response.text();
    if (details) {
      errorMessage += ` - Details: ${details}`;
    }
    throw new Error(errorMessage);
  }
  const contentType = response.headers.get('content-type');
  if (contentType && contentType.includes('application/json')) {
    const body: unknown = await response.json();
    return body;
  }
  return {};
};

export class GoogleSheetsClient implements SheetsClient {
  private auth: JWT;

  constructor(
    private spreadsheetId: string,
    credentials: ServiceAccountCredentials
  ) {
    this.auth = new JWT({
      email: credentials.client_email,
      key: credentials.private_key,
      scopes: SCOPES
    });
  }

  private async authHeaders(): Promise<Record<string, string>> {
    const { token } = await this.auth.getAccessToken();
    if (!token) {
      throw new Error('Google auth returned no access token');
    }
    return { Authorization: `Bearer ${token}` };
  }

  private valuesUrl(range: string): string {
    return `${SHEETS_API_BASE}/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(range)}`;
  }

  async getValues(range: string): Promise<string[][]> {
    log.debug(`GET ${range}`);
    const response = await fetch(this.valuesUrl(range), {
      method: 'GET',
      headers: await this.authHeaders()
    });

    const body = ValueRangeSchema.parse(await handleApiResponse(response));
    return body.values ?? [];
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    log.debug(`PUT ${range}`, values);
    const response = await fetch(`${this.valuesUrl(range)}?valueInputOption=USER_ENTERED`, {
      method: 'PUT',
      headers: {
        ...(await this.authHeaders()),
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({ range, majorDimension: 'ROWS', values })
    });

    await handleApiResponse(response);
  }
}
