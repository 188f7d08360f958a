import { z } from 'zod';
import { describeError, jsonResult } from '@labor-mcp/core';
import { isLookupError, type BlsClient } from '../providers/bls.js';
import { LAUS_MEASURE_CODES } from '../series_ids.js';

const YEAR = /^\d{4}$/;

export const measureSchema = z.enum(LAUS_MEASURE_CODES)
  .default('03')
  .describe('LAUS measure: 03 unemployment rate, 04 unemployment, 05 employment, 06 labor force');

export const yearSchema = z.string().regex(YEAR, 'Year must have four digits');

export const getStateDataSchema = z.object({
  state: z.string().min(1).describe('State name, two-letter abbreviation, or 2-digit FIPS code (e.g. Ohio, OH, 39)'),
  measure: measureSchema,
  startYear: yearSchema.optional().describe('First year, defaults to two years before endYear'),
  endYear: yearSchema.optional().describe('Last year, defaults to last calendar year')
});

export type GetStateDataParams = z.infer<typeof getStateDataSchema>;

export async function getStateData(client: BlsClient, params: GetStateDataParams) {
  try {
    const records = await client.getStateData(params.state, params.measure, params.startYear, params.endYear);
    const [first] = records;
    if (records.length === 1 && first && isLookupError(first)) {
      console.error(`[bls-mcp] state lookup failed: ${first.error}`);
    }
    return jsonResult(records);
  } catch (error) {
    return jsonResult([{ error: `Unexpected failure: ${describeError(error)}` }]);
  }
}
