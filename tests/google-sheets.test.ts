import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import { GoogleSheetsClient } from '../src/providers/google-sheets.js';
import { logger, LogLevel } from '../src/utils/logger.js';

const { jwtOptions } = vi.hoisted(() => {
  const jwtOptions: unknown[] = [];
  return { jwtOptions };
});

vi.mock('google-auth-library', () => ({
  JWT: class {
    constructor(options: unknown) {
      jwtOptions.push(options);
    }

    async getAccessToken(): Promise<{ token: string }> {
      return { token: 'test-token' };
    }
  }
}));

const credentials = {
  client_email: 'collector@test-project.iam.gserviceaccount.com',
  private_key: 'test-private-key'
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

describe('GoogleSheetsClient', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should authenticate as the service account', () => {
    new GoogleSheetsClient('test-sheet', credentials);

    expect(jwtOptions).toContainEqual({
      email: 'collector@test-project.iam.gserviceaccount.com',
      key: 'test-private-key',
      scopes: ['https://www.googleapis.com/auth/spreadsheets']
    });
  });

  it('should read a range as strings', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ range: "'Cap'!A1:A3", majorDimension: 'ROWS', values: [['Date'], ['2026-10-19'], [42]] })
    );
    vi.stubGlobal('fetch', fetchMock);
    const client = new GoogleSheetsClient('test-sheet', credentials);

    await expect(client.getValues("'Cap'!A:A")).resolves.toEqual([['Date'], ['2026-10-19'], ['42']]);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://sheets.googleapis.com/v4/spreadsheets/test-sheet/values/'Cap'!A%3AA",
      { method: 'GET', headers: { Authorization: 'Bearer test-token' } }
    );
  });

  it('should return no rows for an empty range', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ range: "'Cap'!B7", majorDimension: 'ROWS' })));
    const client = new GoogleSheetsClient('test-sheet', credentials);

    await expect(client.getValues("'Cap'!B7")).resolves.toEqual([]);
  });

  it('should write rows with user-entered input', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ updatedCells: 2 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new GoogleSheetsClient('test-sheet', credentials);

    await client.updateValues("'Cap'!A5:B5", [['2026-10-19', 98765]]);

    expect(fetchMock).toHaveBeenCalledWith(
      "https://sheets.googleapis.com/v4/spreadsheets/test-sheet/values/'Cap'!A5%3AB5?valueInputOption=USER_ENTERED",
      {
        method: 'PUT',
        headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
        body: JSON.stringify({ range: "'Cap'!A5:B5", majorDimension: 'ROWS', values: [['2026-10-19', 98765]] })
      }
    );
  });

  it('should surface API errors with their details', async () => {
    vi.stubGlobal('fetch', vi.fn(async () =>
      new Response('The caller does not have permission', { status: 403, statusText: 'Forbidden' })
    ));
    const client = new GoogleSheetsClient('test-sheet', credentials);

    await expect(client.getValues("'Cap'!A:A"))
      .rejects.toThrow('Sheets API Error: 403 Forbidden - Details: The caller does not have permission');
  });
});
