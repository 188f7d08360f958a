import { z } from 'zod';
import { MemoryCache, chunk, describeError, postJSON } from '@labor-mcp/core';
import { DEFAULT_CACHE_TTL_MS, loadBlsConfig, normalizeApiKey } from '../config.js';
import { loadSeriesCatalog, resolveCounty, resolveRegion, loadStates, type SeriesCatalog } from '../catalog.js';
import {
  DEFAULT_MEASURE,
  buildCountySeriesId,
  buildStateSeriesId,
  measureName,
  type LausMeasure
} from '../series_ids.js';

// v2 requires a registration key; v1 is public but limited to 25 series per request
export const BLS_API_V1_URL = 'https://api.bls.gov/publicAPI/v1/timeseries/data/';
export const BLS_API_V2_URL = 'https://api.bls.gov/publicAPI/v2/timeseries/data/';

export const PUBLIC_BATCH_SIZE = 25;
export const REGISTERED_BATCH_SIZE = 50;
export const REQUEST_SUCCEEDED = 'REQUEST_SUCCEEDED';

export interface SeriesRecord {
  readonly seriesId: string;
  readonly seriesName: string;
  readonly year: string;
  readonly period: string;
  readonly value: string;
  readonly footnotes: string;
}

export interface StateSeriesRecord extends SeriesRecord {
  readonly state: string;
}

export interface CountySeriesRecord extends SeriesRecord {
  readonly county: string;
}

export interface LookupError {
  error: string;
}

/** Element of every tool-facing lookup result; failures arrive as data. */
export type LookupRecord = SeriesRecord | LookupError;

export function isLookupError(record: LookupRecord): record is LookupError {
  return 'error' in record;
}

export interface SeriesMatch {
  seriesId: string;
  seriesName: string;
  latestValue: string | null;
  latestPeriod: string;
}

export interface StateListing {
  state: string;
  abbreviation: string;
  fips: string;
  exampleSeriesId: string;
}

export interface AccessMode {
  registered: boolean;
  batchSize: number;
  apiUrl: string;
}

export interface BlsRequestPayload {
  seriesid: string[];
  startyear: string;
  endyear: string;
  registrationkey?: string;
}

/** Sends one payload to the BLS endpoint and resolves to the decoded JSON body. */
export type BlsTransport = (url: string, payload: BlsRequestPayload) => Promise<unknown>;

export interface BlsClientOptions {
  /** Defaults to BLS_API_KEY from the environment. */
  apiKey?: string;
  catalog?: SeriesCatalog;
  cacheTtlMs?: number;
  transport?: BlsTransport;
  now?: () => Date;
}

const footnoteSchema = z.object({ text: z.string().optional() }).nullable();

const datumSchema = z.object({
  year: z.string(),
  period: z.string(),
  value: z.string(),
  footnotes: z.array(footnoteSchema).optional()
});

const seriesSchema = z.object({
  seriesID: z.string(),
  data: z.array(datumSchema)
});

const responseSchema = z.object({
  status: z.string(),
  message: z.union([z.string(), z.array(z.string())]).optional(),
  Results: z.object({
    series: z.array(seriesSchema).optional()
  }).optional()
});

export type BlsApiResponse = z.infer<typeof responseSchema>;
type BlsDatum = z.infer<typeof datumSchema>;

const defaultTransport: BlsTransport = (url, payload) => postJSON(url, payload);

function flattenFootnotes(datum: BlsDatum): string {
  return (datum.footnotes ?? [])
    .map(footnote => footnote?.text)
    .filter((text): text is string => text !== undefined)
    .join(', ');
}

function apiMessage(response: BlsApiResponse): string {
  const { message } = response;
  if (Array.isArray(message)) return message.length ? message.join('; ') : 'unknown';
  return message || 'unknown';
}

/**
 * Caching client for the BLS public time-series API.
 *
 * The national catalog is fetched in batches on first use and served from
 * memory until the TTL runs out. State and county LAUS series are fetched one
 * at a time on demand and land in the same cache.
 *
 * Not safe to share across worker threads; within one event loop a bulk
 * refresh already in flight is shared by every caller.
 */
export class BlsClient {
  readonly accessMode: AccessMode;

  private readonly apiKey: string | undefined;
  private readonly catalog: SeriesCatalog;
  private readonly transport: BlsTransport;
  private readonly now: () => Date;
  private readonly cache: MemoryCache<SeriesRecord[]>;
  private refreshing: Promise<void> | null = null;

  constructor(options: BlsClientOptions = {}) {
    // The environment is only consulted for options the caller left out
    const config = options.apiKey === undefined || options.cacheTtlMs === undefined ? loadBlsConfig() : undefined;
    this.apiKey = options.apiKey === undefined ? config?.apiKey : normalizeApiKey(options.apiKey);
    this.accessMode = {
      registered: this.apiKey !== undefined,
      batchSize: this.apiKey ? REGISTERED_BATCH_SIZE : PUBLIC_BATCH_SIZE,
      apiUrl: this.apiKey ? BLS_API_V2_URL : BLS_API_V1_URL
    };
    this.catalog = options.catalog ?? loadSeriesCatalog();
    this.transport = options.transport ?? defaultTransport;
    this.now = options.now ?? (() => new Date());
    this.cache = new MemoryCache<SeriesRecord[]>(
      options.cacheTtlMs ?? config?.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
      () => this.now().getTime()
    );

    console.error(
      `[bls] client initialized (registered=${this.accessMode.registered ? 'yes' : 'no'}, batch_size=${this.accessMode.batchSize})`
    );
  }

  /** True when the cache holds data and the last bulk fetch is inside the TTL. */
  get isCacheValid(): boolean {
    return this.cache.isFresh();
  }

  async fetchAllSeries(startYear?: string, endYear?: string): Promise<void> {
    if (this.isCacheValid) {
      console.error('[bls] cache still valid, skipping fetch');
      return;
    }
    if (!this.refreshing) {
      this.refreshing = this.refreshAll(startYear, endYear).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  async getSeries(seriesId: string): Promise<SeriesRecord[]> {
    await this.fetchAllSeries();
    return [...(this.cache.get(seriesId) ?? [])];
  }

  async getAllCachedData(): Promise<Record<string, SeriesRecord[]>> {
    await this.fetchAllSeries();
    const copy: Record<string, SeriesRecord[]> = {};
    for (const [seriesId, records] of Object.entries(this.cache.toObject())) {
      copy[seriesId] = [...records];
    }
    return copy;
  }

  async searchSeries(keyword: string): Promise<SeriesMatch[]> {
    await this.fetchAllSeries();
    const needle = keyword.toLowerCase();
    const matches: SeriesMatch[] = [];

    for (const [seriesId, seriesName] of this.catalog) {
      if (!seriesName.toLowerCase().includes(needle)) continue;
      const latest = this.cache.get(seriesId)?.[0];
      matches.push({
        seriesId,
        seriesName,
        latestValue: latest?.value ?? null,
        latestPeriod: latest ? `${latest.year} ${latest.period}`.trim() : ''
      });
    }
    return matches;
  }

  listAvailableSeries(): { seriesId: string; seriesName: string }[] {
    return Array.from(this.catalog, ([seriesId, seriesName]) => ({ seriesId, seriesName }));
  }

  listStates(): StateListing[] {
    return [...loadStates()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(entry => ({
        state: entry.name,
        abbreviation: entry.abbreviation,
        fips: entry.fips,
        exampleSeriesId: buildStateSeriesId(entry.fips)
      }));
  }

  async getStateData(
    state: string,
    measure: LausMeasure = DEFAULT_MEASURE,
    startYear?: string,
    endYear?: string
  ): Promise<LookupRecord[]> {
    const region = resolveRegion(state);
    if (!region) {
      return [{ error: `Unknown state: '${state}'. Use a state name, abbreviation, or FIPS code.` }];
    }
    const seriesId = buildStateSeriesId(region.fips, measure);
    return this.fetchOnDemand(seriesId, startYear, endYear, (base): StateSeriesRecord => ({
      ...base,
      seriesName: `${region.name} - ${measureName(measure)}`,
      state: region.name
    }));
  }

  async getCountyData(
    fips: string,
    label?: string,
    measure: LausMeasure = DEFAULT_MEASURE,
    startYear?: string,
    endYear?: string
  ): Promise<LookupRecord[]> {
    const region = resolveCounty(fips, label);
    if (!region) {
      return [{ error: `Unknown county: '${fips}'. Use a 5-digit county FIPS code such as 39049.` }];
    }
    const seriesId = buildCountySeriesId(region.fips, measure);
    const county = region.label ?? `County FIPS ${region.fips}`;
    return this.fetchOnDemand(seriesId, startYear, endYear, (base): CountySeriesRecord => ({
      ...base,
      seriesName: `${county} - ${measureName(measure)}`,
      county
    }));
  }

  private defaultYears(startYear?: string, endYear?: string): { startYear: string; endYear: string } {
    // The current year is usually incomplete, so default to the last full one
    const end = endYear || String(this.now().getFullYear() - 1);
    const start = startYear || String(Number.parseInt(end, 10) - 2);
    return { startYear: start, endYear: end };
  }

  private async refreshAll(startYear?: string, endYear?: string): Promise<void> {
    const years = this.defaultYears(startYear, endYear);
    const seriesIds = [...this.catalog.keys()];
    console.error(
      `[bls] fetching ${seriesIds.length} series from ${years.startYear} to ${years.endYear} (batch_size=${this.accessMode.batchSize})`
    );

    for (const batch of chunk(seriesIds, this.accessMode.batchSize)) {
      let response: BlsApiResponse;
      try {
        response = await this.fetchBatch(batch, years.startYear, years.endYear);
      } catch (error) {
        console.error('[bls] error fetching batch:', describeError(error));
        continue;
      }
      if (response.status !== REQUEST_SUCCEEDED) {
        console.warn(`[bls] API returned status ${response.status}: ${apiMessage(response)}`);
        continue;
      }

      for (const series of response.Results?.series ?? []) {
        const seriesName = this.catalog.get(series.seriesID) ?? 'Unknown';
        this.cache.set(series.seriesID, series.data.map(datum => this.toRecord(series.seriesID, seriesName, datum)));
      }
    }

    this.cache.markRefreshed();
    console.error(`[bls] cached ${this.cache.size} series`);
  }

  private async fetchOnDemand<R extends SeriesRecord>(
    seriesId: string,
    startYear: string | undefined,
    endYear: string | undefined,
    decorate: (base: SeriesRecord) => R
  ): Promise<LookupRecord[]> {
    const cached = this.cache.get(seriesId);
    if (cached && this.isCacheValid) {
      console.error(`[bls] cache hit for ${seriesId}`);
      return [...cached];
    }

    const years = this.defaultYears(startYear, endYear);
    let response: BlsApiResponse;
    try {
      response = await this.fetchBatch([seriesId], years.startYear, years.endYear);
    } catch (error) {
      console.error(`[bls] error fetching ${seriesId}:`, describeError(error));
      return [{ error: `Request failed: ${describeError(error)}` }];
    }
    if (response.status !== REQUEST_SUCCEEDED) {
      return [{ error: `BLS API error: ${apiMessage(response)}` }];
    }

    const records: R[] = [];
    for (const series of response.Results?.series ?? []) {
      for (const datum of series.data) {
        records.push(decorate(this.toRecord(seriesId, seriesId, datum)));
      }
    }
    this.cache.set(seriesId, records);
    return [...records];
  }

  private toRecord(seriesId: string, seriesName: string, datum: BlsDatum): SeriesRecord {
    return {
      seriesId,
      seriesName,
      year: datum.year,
      period: datum.period,
      value: datum.value,
      footnotes: flattenFootnotes(datum)
    };
  }

  private buildPayload(seriesIds: string[], startYear: string, endYear: string): BlsRequestPayload {
    const payload: BlsRequestPayload = {
      seriesid: seriesIds,
      startyear: startYear,
      endyear: endYear
    };
    if (this.apiKey) {
      payload.registrationkey = this.apiKey;
    }
    return payload;
  }

  private async fetchBatch(seriesIds: string[], startYear: string, endYear: string): Promise<BlsApiResponse> {
    console.error(
      `[bls] API request: ${seriesIds.length} series, ${startYear}-${endYear}, url=${this.accessMode.apiUrl}`
    );
    const raw = await this.transport(this.accessMode.apiUrl, this.buildPayload(seriesIds, startYear, endYear));
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Unexpected BLS response (${issue.path.join('.') || 'root'}): ${issue.message}`);
    }
    return parsed.data;
  }
}
