import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { LocationType } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = resolve(__dirname, '../../../data/location-catalog.json');

export interface CatalogEntry {
  names: string[];
  descriptions: string[];
}

export type LocationCatalog = Record<LocationType, CatalogEntry>;

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'string' && v.length > 0);
}

function isCatalogEntry(value: unknown): value is CatalogEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'names' in value && isStringList(value.names)
    && 'descriptions' in value && isStringList(value.descriptions);
}

/** Check parsed JSON against the catalog shape; every location type needs names and descriptions. */
export function parseCatalog(data: unknown): LocationCatalog {
  if (typeof data !== 'object' || data === null) {
    throw new TypeError('Location catalog must be an object');
  }
  const entries = new Map<string, unknown>(Object.entries(data));
  const entryFor = (type: LocationType): CatalogEntry => {
    const entry = entries.get(type);
    if (!isCatalogEntry(entry)) {
      throw new TypeError(`Location catalog entry "${type}" needs non-empty names and descriptions`);
    }
    return entry;
  };
  return {
    village: entryFor('village'),
    ruins: entryFor('ruins'),
    viewpoint: entryFor('viewpoint'),
    beach: entryFor('beach'),
    grove: entryFor('grove'),
  };
}

let cachedDefault: LocationCatalog | undefined;

export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): LocationCatalog {
  if (path === DEFAULT_CATALOG_PATH && cachedDefault) return cachedDefault;
  const catalog = parseCatalog(JSON.parse(readFileSync(path, 'utf-8')));
  if (path === DEFAULT_CATALOG_PATH) cachedDefault = catalog;
  return catalog;
}
