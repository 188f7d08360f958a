import { z } from 'zod';
import { describeError, jsonResult, textResult } from '@labor-mcp/core';
import type { BlsClient } from '../providers/bls.js';

export const getSeriesSchema = z.object({
  seriesId: z.string().trim().min(1).describe('BLS series ID, e.g. LNS14000000 for the national unemployment rate')
});

export type GetSeriesParams = z.infer<typeof getSeriesSchema>;

export async function getSeries(client: BlsClient, params: GetSeriesParams) {
  try {
    const records = await client.getSeries(params.seriesId);
    if (records.length === 0) {
      return jsonResult({ error: `No data found for series ID: ${params.seriesId}` });
    }
    return jsonResult(records);
  } catch (error) {
    return textResult(`Error retrieving series: ${describeError(error)}`);
  }
}
