import test from 'node:test';
import assert from 'node:assert/strict';

import { SINK_COLUMNS } from '@scrim-drafts/shared';
import { GoogleSheetsSink, columnLetter, quoteSheetName, rowOfRange } from '../src/sheets/googleSheetsSink.js';
import type { CredentialProvider } from '../src/sheets/credentials.js';
import { isSinkTransientError, isSinkWriteFailedError } from '../src/errors.js';
import { fakeHttp } from './helpers/fakes.js';
import type { FakeReply, RecordedRequest } from './helpers/fakes.js';

const BASE = 'https://sheets.googleapis.com/v4/spreadsheets/sheet-123';
const KEY_COLUMN_URL = `${BASE}/values/'Draft%20Data'!A%3AA`;
const APPEND_URL = `${BASE}/values/'Draft%20Data'!A%3AX:append`;

class FakeCredentials implements CredentialProvider {
  refreshes = 0;
  private token = 'test-token-1';

  constructor(private valid = true) {}

  isValid(): boolean {
    return this.valid;
  }

  async refresh(): Promise<void> {
    this.refreshes++;
    this.token = `test-token-${this.refreshes + 1}`;
    this.valid = true;
  }

  accessToken(): string {
    return this.token;
  }
}

/** In-process stand-in for the values endpoints of one sheet. */
function sheetsServer(initial: string[][], override?: (req: RecordedRequest) => FakeReply | undefined) {
  const rows = initial.map((r) => [...r]);
  return fakeHttp((req) => {
    const custom = override?.(req);
    if (custom) return custom;
    if (req.method === 'GET' && req.url === KEY_COLUMN_URL) {
      return { status: 200, data: rows.length === 0 ? { range: 'A1:A1000' } : { values: rows.map((r) => [r[0] ?? '']) } };
    }
    if (req.method === 'POST' && req.url === APPEND_URL) {
      rows.push(['appended']);
      const n = rows.length;
      return { status: 200, data: { updates: { updatedRange: `'Draft Data'!A${n}:X${n}` } } };
    }
    if (req.method === 'PUT') {
      if (req.url.endsWith(`!A1%3AX1`)) rows.unshift(['Series ID']);
      return { status: 200, data: {} };
    }
    return { status: 404 };
  });
}

const sinkWith = (http: ReturnType<typeof fakeHttp>['http'], credentials: CredentialProvider = new FakeCredentials()) =>
  new GoogleSheetsSink({ spreadsheetId: 'sheet-123', sheetName: 'Draft Data', credentials, http });

const cells = (key: string) => [key, ...Array.from({ length: 23 }, () => '')];

test('A1 helpers', () => {
  assert.equal(columnLetter(24), 'X');
  assert.equal(columnLetter(28), 'AB');
  assert.equal(quoteSheetName("Bob's Drafts"), "'Bob''s Drafts'");
  assert.equal(rowOfRange("'Draft Data'!A7:X7"), 7);
  assert.equal(rowOfRange(undefined), undefined);
});

test('an empty sheet gets the header before the first appended row', async () => {
  const { http, requests } = sheetsServer([]);
  const sink = sinkWith(http);

  assert.equal(await sink.upsertRow('s1', cells('s1')), 'inserted');

  assert.deepEqual(requests.map((r) => r.method), ['GET', 'PUT', 'POST']);
  assert.equal(requests[1]?.url, `${BASE}/values/'Draft%20Data'!A1%3AX1`);
  assert.deepEqual(requests[1]?.body, { values: [[...SINK_COLUMNS]] });
  assert.deepEqual(requests[2]?.params, { valueInputOption: 'RAW', insertDataOption: 'INSERT_ROWS' });
  assert.deepEqual(requests[2]?.body, { values: [cells('s1')] });
  assert.equal(requests[2]?.authorization, 'Bearer test-token-1');
});

test('existing keys are read once and updated in place', async () => {
  const { http, requests } = sheetsServer([['Series ID'], ['s1'], ['s2']]);
  const sink = sinkWith(http);

  assert.equal(await sink.hasRow('s2'), true);
  assert.equal(await sink.hasRow('Series ID'), false);
  assert.equal(await sink.hasRow('s9'), false);
  assert.equal(await sink.upsertRow('s2', cells('s2')), 'updated');

  assert.deepEqual(requests.map((r) => r.method), ['GET', 'PUT']);
  assert.equal(requests[1]?.url, `${BASE}/values/'Draft%20Data'!A3%3AX3`);
});

test('appended rows are tracked without re-reading the sheet', async () => {
  const { http, requests } = sheetsServer([['Series ID'], ['s1']]);
  const sink = sinkWith(http);

  assert.equal(await sink.upsertRow('s2', cells('s2')), 'inserted');
  assert.equal(await sink.hasRow('s2'), true);
  assert.equal(await sink.upsertRow('s2', cells('s2')), 'updated');

  assert.deepEqual(requests.map((r) => r.method), ['GET', 'POST', 'PUT']);
  assert.equal(requests[2]?.url, `${BASE}/values/'Draft%20Data'!A3%3AX3`);
});

test('refresh re-reads the key column on the next lookup', async () => {
  let keyColumn = [['Series ID'], ['s1']];
  const { http, requests } = fakeHttp(() => ({ status: 200, data: { values: keyColumn } }));
  const sink = sinkWith(http);

  assert.equal(await sink.hasRow('s2'), false);
  keyColumn = [['Series ID'], ['s1'], ['s2']];
  assert.equal(await sink.hasRow('s2'), false);
  sink.refresh();
  assert.equal(await sink.hasRow('s2'), true);

  assert.deepEqual(requests.map((r) => r.url), [KEY_COLUMN_URL, KEY_COLUMN_URL]);
});

test('a 401 refreshes the credentials once and retries', async () => {
  let rejected = false;
  const { http, requests } = sheetsServer([['Series ID']], (req) => {
    if (!rejected) {
      rejected = true;
      return { status: 401 };
    }
    return undefined;
  });
  const credentials = new FakeCredentials();
  const sink = sinkWith(http, credentials);

  assert.equal(await sink.hasRow('s1'), false);
  assert.equal(credentials.refreshes, 1);
  assert.deepEqual(requests.map((r) => r.authorization), ['Bearer test-token-1', 'Bearer test-token-2']);
});

test('invalid credentials are refreshed before the first call', async () => {
  const { http, requests } = sheetsServer([['Series ID']]);
  const credentials = new FakeCredentials(false);
  await sinkWith(http, credentials).hasRow('s1');
  assert.equal(credentials.refreshes, 1);
  assert.equal(requests[0]?.authorization, 'Bearer test-token-2');
});

test('HTTP failures map onto transient and fatal sink errors', async () => {
  const cases: Array<[FakeReply, (err: unknown) => boolean]> = [
    [{ status: 401 }, (err) => isSinkWriteFailedError(err) && err.status === 401],
    [{ status: 403 }, (err) => isSinkWriteFailedError(err) && err.status === 403],
    [{ status: 400 }, (err) => isSinkWriteFailedError(err) && err.status === 400],
    [{ status: 429, headers: { 'retry-after': '3' } }, (err) => isSinkTransientError(err) && err.retryAfterMs === 3000],
    [{ status: 503 }, (err) => isSinkTransientError(err) && err.status === 503],
    [{ networkError: 'socket hang up' }, (err) => isSinkTransientError(err) && err.status === undefined],
  ];
  for (const [reply, check] of cases) {
    const { http } = fakeHttp(() => reply);
    await assert.rejects(sinkWith(http).hasRow('s1'), check);
  }
});

test('a failed write forgets the cached keys', async () => {
  let failAppend = true;
  const { http, requests } = sheetsServer([['Series ID']], (req) => {
    if (req.method === 'POST' && failAppend) {
      failAppend = false;
      return { status: 500 };
    }
    return undefined;
  });
  const sink = sinkWith(http);

  await assert.rejects(sink.upsertRow('s1', cells('s1')), (err: unknown) => isSinkTransientError(err));
  await sink.hasRow('s1');
  assert.deepEqual(requests.map((r) => r.method), ['GET', 'POST', 'GET']);
});

test('formatSheet looks up the sheet id and sends one batch update', async () => {
  const { http, requests } = fakeHttp((req) => {
    if (req.method === 'GET') {
      return {
        status: 200,
        data: { sheets: [{ properties: { sheetId: 0, title: 'Other' } }, { properties: { sheetId: 42, title: 'Draft Data' } }] },
      };
    }
    return { status: 200, data: {} };
  });
  await sinkWith(http).formatSheet();

  assert.equal(requests[0]?.url, BASE);
  assert.equal(requests[1]?.url, `${BASE}:batchUpdate`);
  assert.deepEqual(requests[1]?.body, {
    requests: [
      {
        updateSheetProperties: {
          properties: { sheetId: 42, gridProperties: { frozenRowCount: 1 } },
          fields: 'gridProperties.frozenRowCount',
        },
      },
      {
        repeatCell: {
          range: { sheetId: 42, startRowIndex: 0, endRowIndex: 1 },
          cell: { userEnteredFormat: { textFormat: { bold: true } } },
          fields: 'userEnteredFormat.textFormat.bold',
        },
      },
      {
        autoResizeDimensions: {
          dimensions: { sheetId: 42, dimension: 'COLUMNS', startIndex: 0, endIndex: 24 },
        },
      },
    ],
  });
});

test('formatSheet fails when the sheet does not exist', async () => {
  const { http } = fakeHttp(() => ({ status: 200, data: { sheets: [] } }));
  await assert.rejects(sinkWith(http).formatSheet(), /Sheet "Draft Data" not found/);
});

test('createSpreadsheet returns the new spreadsheet id', async () => {
  const { http, requests } = fakeHttp(() => ({ status: 200, data: { spreadsheetId: 'new-sheet-1' } }));
  const id = await GoogleSheetsSink.createSpreadsheet({
    title: 'Scrim Drafts',
    sheetName: 'Draft Data',
    credentials: new FakeCredentials(),
    http,
  });
  assert.equal(id, 'new-sheet-1');
  assert.equal(requests[0]?.method, 'POST');
  assert.equal(requests[0]?.url, 'https://sheets.googleapis.com/v4/spreadsheets');
});
