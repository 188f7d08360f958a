import { z } from 'zod';
import { describeError, jsonResult } from '@labor-mcp/core';
import { isLookupError, type BlsClient } from '../providers/bls.js';
import { measureSchema, yearSchema } from './get_state_data.js';

export const getCountyDataSchema = z.object({
  countyFips: z.string().min(1).describe('5-digit county FIPS code, e.g. 39049 for Franklin County, OH'),
  countyName: z.string().optional().describe('Optional display name for the county'),
  measure: measureSchema,
  startYear: yearSchema.optional().describe('First year, defaults to two years before endYear'),
  endYear: yearSchema.optional().describe('Last year, defaults to last calendar year')
});

export type GetCountyDataParams = z.infer<typeof getCountyDataSchema>;

export async function getCountyData(client: BlsClient, params: GetCountyDataParams) {
  try {
    const records = await client.getCountyData(
      params.countyFips,
      params.countyName,
      params.measure,
      params.startYear,
      params.endYear
    );
    const [first] = records;
    if (records.length === 1 && first && isLookupError(first)) {
      console.error(`[bls-mcp] county lookup failed: ${first.error}`);
    }
    return jsonResult(records);
  } catch (error) {
    return jsonResult([{ error: `Unexpected failure: ${describeError(error)}` }]);
  }
}
