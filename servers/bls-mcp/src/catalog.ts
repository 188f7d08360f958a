import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadJsonFile, loadYamlFile } from '@labor-mcp/core';

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.resolve(MODULE_DIR, '..', 'data');

export type SeriesCatalog = ReadonlyMap<string, string>;

export interface StateEntry {
  name: string;
  abbreviation: string;
  fips: string;
}

export interface StateRegion {
  kind: 'state';
  fips: string;
  name: string;
}

export interface CountyRegion {
  kind: 'county';
  fips: string;
  label?: string;
}

const seriesCatalogSchema = z.record(z.string().min(1), z.string().min(1));

const statesSchema = z.array(z.object({
  name: z.string().min(1),
  abbreviation: z.string().length(2),
  fips: z.string().regex(/^\d{2}$/)
}));

let seriesCache: SeriesCatalog | null = null;
let statesCache: readonly StateEntry[] | null = null;

export function loadSeriesCatalog(): SeriesCatalog {
  if (!seriesCache) {
    const raw = loadYamlFile(path.join(DATA_DIR, 'series.yml'), seriesCatalogSchema);
    seriesCache = new Map(Object.entries(raw));
  }
  return seriesCache;
}

export function loadStates(): readonly StateEntry[] {
  if (!statesCache) {
    statesCache = Object.freeze(loadJsonFile(path.join(DATA_DIR, 'states.json'), statesSchema));
  }
  return statesCache;
}

function toStateRegion(entry: StateEntry): StateRegion {
  return { kind: 'state', fips: entry.fips, name: entry.name };
}

/**
 * Resolve a state abbreviation, full name or FIPS code.
 *
 * Abbreviations win over names, names over numeric codes.
 */
export function resolveRegion(input: string): StateRegion | null {
  const value = input.trim();
  if (!value) return null;

  const states = loadStates();
  const upper = value.toUpperCase();
  const byAbbreviation = states.find(s => s.abbreviation === upper);
  if (byAbbreviation) return toStateRegion(byAbbreviation);

  const lower = value.toLowerCase();
  const byName = states.find(s => s.name.toLowerCase() === lower);
  if (byName) return toStateRegion(byName);

  const code = value.padStart(2, '0');
  const byFips = states.find(s => s.fips === code);
  return byFips ? toStateRegion(byFips) : null;
}

export function resolveCounty(fips: string, label?: string): CountyRegion | null {
  const value = fips.trim();
  if (!/^\d{1,5}$/.test(value)) return null;

  const code = value.padStart(5, '0');
  const stateFips = code.slice(0, 2);
  if (!loadStates().some(s => s.fips === stateFips)) return null;

  return {
    kind: 'county',
    fips: code,
    label: label?.trim() || `County FIPS ${code}`
  };
}
