import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface ChampionCatalog {
  nameOf(championId: number): string;
}

export const DEFAULT_CHAMPION_CATALOG_FILE = fileURLToPath(new URL('../../data/champions.json', import.meta.url));

const catalogFileSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

export class StaticChampionCatalog implements ChampionCatalog {
  private readonly names: ReadonlyMap<number, string>;

  constructor(names: Record<string, string>) {
    this.names = new Map(Object.entries(names).map(([id, name]): [number, string] => [Number(id), name]));
  }

  nameOf(championId: number): string {
    return this.names.get(championId) ?? `Unknown (${championId})`;
  }

  get size(): number {
    return this.names.size;
  }
}

/**
 * Reads an `{ "<id>": "<name>" }` JSON file. Throws when the file is missing or not that shape.
 */
export function loadChampionCatalog(filePath: string = DEFAULT_CHAMPION_CATALOG_FILE): StaticChampionCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid champion catalog ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return new StaticChampionCatalog(parsed.data);
}
