export type SeasonalCode = 'S' | 'U';

/** LAUS measure codes, the last two characters of a LAUS series id. */
export const LAUS_MEASURES = {
  '03': 'Unemployment Rate',
  '04': 'Unemployment',
  '05': 'Employment',
  '06': 'Labor Force'
} as const;

export type LausMeasure = keyof typeof LAUS_MEASURES;

export const LAUS_MEASURE_CODES = ['03', '04', '05', '06'] as const satisfies readonly LausMeasure[];

export const DEFAULT_MEASURE: LausMeasure = '03';

/**
 * LAUS state series id: `LA` + seasonal flag + `ST` + 2-digit FIPS
 * + 11 zeros + measure, 20 characters in all.
 */
export function buildStateSeriesId(fips: string, measure: LausMeasure = DEFAULT_MEASURE, seasonal: SeasonalCode = 'S'): string {
  return `LA${seasonal}ST${fips.padStart(2, '0')}${'0'.repeat(11)}${measure}`;
}

/**
 * LAUS county series id: `LAU` + `CN` + 5-digit FIPS + 8 zeros + measure.
 * County data is only published not seasonally adjusted.
 */
export function buildCountySeriesId(fips: string, measure: LausMeasure = DEFAULT_MEASURE): string {
  return `LAUCN${fips.padStart(5, '0')}${'0'.repeat(8)}${measure}`;
}

export function measureName(measure: LausMeasure): string {
  return LAUS_MEASURES[measure];
}
