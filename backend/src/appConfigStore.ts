import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage } from './errors.js';

const appConfigSchema = z
  .object({
    spreadsheet_id: z.string().optional(),
  })
  .passthrough();

export type StoredAppConfig = z.infer<typeof appConfigSchema>;

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Small JSON settings file kept beside the ledger (`config.json`). Holds the id of the
 * spreadsheet the CLI created on its first run.
 */
export class AppConfigStore {
  constructor(readonly filePath: string) {}

  async read(): Promise<StoredAppConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new Error(`${this.filePath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }
    const parsed = appConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`${this.filePath} has an invalid shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async spreadsheetId(): Promise<string | undefined> {
    const id = (await this.read()).spreadsheet_id?.trim();
    return id ? id : undefined;
  }

  async saveSpreadsheetId(spreadsheetId: string): Promise<void> {
    const next = { ...(await this.read()), spreadsheet_id: spreadsheetId };
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(next, null, 2), 'utf8');
    await fs.rename(tmpPath, this.filePath);
  }
}
