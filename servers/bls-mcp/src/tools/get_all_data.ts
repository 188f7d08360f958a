import { describeError, jsonResult, textResult } from '@labor-mcp/core';
import type { BlsClient } from '../providers/bls.js';

export interface SeriesSummary {
  seriesName: string;
  latestValue: string;
  latestPeriod: string;
  totalRecords: number;
}

/** One line per cached series with its first (most recent) observation. */
export async function getAllData(client: BlsClient) {
  try {
    const data = await client.getAllCachedData();
    const summary: Record<string, SeriesSummary> = {};
    for (const [seriesId, records] of Object.entries(data)) {
      const latest = records[0];
      if (!latest) continue;
      summary[seriesId] = {
        seriesName: latest.seriesName,
        latestValue: latest.value,
        latestPeriod: `${latest.year} ${latest.period}`.trim(),
        totalRecords: records.length
      };
    }
    return jsonResult(summary);
  } catch (error) {
    return textResult(`Error summarising cached data: ${describeError(error)}`);
  }
}
