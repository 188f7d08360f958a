import { z } from 'zod';
import { describeError, jsonResult, textResult } from '@labor-mcp/core';
import type { BlsClient } from '../providers/bls.js';

export const searchSeriesSchema = z.object({
  keyword: z.string().trim().min(1).describe("Keyword to look for in series names, e.g. 'unemployment', 'CPI', 'earnings'")
});

export type SearchSeriesParams = z.infer<typeof searchSeriesSchema>;

export async function searchSeries(client: BlsClient, params: SearchSeriesParams) {
  try {
    const matches = await client.searchSeries(params.keyword);
    if (matches.length === 0) {
      return jsonResult({ message: `No series found matching '${params.keyword}'` });
    }
    return jsonResult(matches);
  } catch (error) {
    return textResult(`Error searching series: ${describeError(error)}`);
  }
}
