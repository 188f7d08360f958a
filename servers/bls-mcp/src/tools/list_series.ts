import { jsonResult } from '@labor-mcp/core';
import type { BlsClient } from '../providers/bls.js';

export function listSeries(client: BlsClient) {
  return jsonResult(client.listAvailableSeries());
}
