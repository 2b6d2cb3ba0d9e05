import fs from 'fs/promises';
import type { CatalogObject } from '../common/types';
import { logInfo } from './logger';
import type { ObjectResolver } from './mountController';

interface CatalogEntry {
  /** Aliases joined by `;`, e.g. `M 31;Andromeda Galaxy;NGC 224`. */
  names: string;
  ra: number;
  dec: number;
  magnitude: number;
  type: string;
  distance: number;
}

export interface CatalogTable {
  name: string;
  description?: string;
  objects: CatalogEntry[];
}

const LIGHT_YEARS_PER_PARSEC = 3.262;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toEntry(value: unknown): CatalogEntry | undefined {
  if (!isRecord(value) || typeof value.names !== 'string') {
    return undefined;
  }
  const ra = Number(value.ra);
  const dec = Number(value.dec);
  if (!Number.isFinite(ra) || !Number.isFinite(dec)) {
    return undefined;
  }
  return {
    names: value.names,
    ra,
    dec,
    magnitude: Number(value.magnitude ?? 0),
    type: typeof value.type === 'string' ? value.type : '',
    distance: Number(value.distance ?? 0)
  };
}

function toTables(raw: unknown): CatalogTable[] {
  const catalogs = isRecord(raw) && Array.isArray(raw.catalogs) ? raw.catalogs : [];
  return catalogs.filter(isRecord).map((table) => ({
    name: String(table.name ?? 'catalog'),
    description: typeof table.description === 'string' ? table.description : undefined,
    objects: (Array.isArray(table.objects) ? table.objects : [])
      .map(toEntry)
      .filter((entry): entry is CatalogEntry => entry !== undefined)
  }));
}

/** Linear name search over pre-loaded object tables. */
export class StaticCatalog implements ObjectResolver {
  constructor(private tables: CatalogTable[]) {}

  static async load(filePath: string): Promise<StaticCatalog> {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    const tables = toTables(raw);
    tables.forEach((table) => {
      logInfo('catalog_loaded', { catalog: table.name, entries: table.objects.length, description: table.description });
    });
    return new StaticCatalog(tables);
  }

  size(): number {
    return this.tables.reduce((total, table) => total + table.objects.length, 0);
  }

  findObject(name: string): CatalogObject | undefined {
    const found = this.search(name);
    if (found) {
      logInfo('catalog_object_found', {
        query: name,
        name: found.name,
        catalog: found.catalog,
        magnitude: found.magnitude,
        type: found.type,
        distanceLy: found.distance > 0 ? found.distance * LIGHT_YEARS_PER_PARSEC : undefined
      });
    } else {
      logInfo('catalog_object_missing', { query: name });
    }
    return found;
  }

  private search(name: string): CatalogObject | undefined {
    // "M51" is tried as "M 51" first
    if (!name.includes(' ')) {
      const split = /^(\D+)(\d.*)$/.exec(name.trim());
      if (split) {
        const found = this.lookup(`${split[1]} ${split[2]}`);
        if (found) {
          return found;
        }
      }
    }
    return this.lookup(name);
  }

  private lookup(name: string): CatalogObject | undefined {
    const query = name.trim().toLowerCase();
    if (!query) {
      return undefined;
    }
    const patterns = [`;${query};`, `${query};`, `;${query}`, query];

    for (const table of this.tables) {
      const names = table.objects.map((entry) => entry.names.toLowerCase().replace(/\s+/g, ' '));
      for (const pattern of patterns) {
        const index = names.findIndex((candidate) => candidate.includes(pattern));
        if (index >= 0) {
          const entry = table.objects[index];
          return {
            catalog: table.name,
            name: entry.names,
            ra: entry.ra,
            dec: entry.dec,
            magnitude: entry.magnitude,
            type: entry.type,
            distance: entry.distance
          };
        }
      }
    }
    return undefined;
  }
}
