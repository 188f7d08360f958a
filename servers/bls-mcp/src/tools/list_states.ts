import { jsonResult } from '@labor-mcp/core';
import type { BlsClient } from '../providers/bls.js';

export function listStates(client: BlsClient) {
  return jsonResult(client.listStates());
}
