import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { BlsClient } from './providers/bls.js';
import { getSeries, getSeriesSchema } from './tools/get_series.js';
import { searchSeries, searchSeriesSchema } from './tools/search_series.js';
import { listSeries } from './tools/list_series.js';
import { getAllData } from './tools/get_all_data.js';
import { getStateData, getStateDataSchema } from './tools/get_state_data.js';
import { getCountyData, getCountyDataSchema } from './tools/get_county_data.js';
import { listStates } from './tools/list_states.js';

/**
 * Builds an MCP server with every BLS tool registered against `client`.
 * HTTP mode builds one per request, so the client (and its cache) is shared.
 */
export function createBlsServer(client: BlsClient): McpServer {
  const server = new McpServer({
    name: 'bls-mcp',
    version: '0.1.0'
  });

  // Tool names are prefixed so several MCP servers can share one agent

  server.tool(
    'bls_get_series',
    'Get BLS time series data for a series ID (e.g. LNS14000000 for the unemployment rate).',
    getSeriesSchema.shape,
    async (params) => getSeries(client, getSeriesSchema.parse(params))
  );

  server.tool(
    'bls_search_series',
    "Search BLS series by keyword (e.g. 'unemployment', 'CPI', 'employment', 'wages').",
    searchSeriesSchema.shape,
    async (params) => searchSeries(client, searchSeriesSchema.parse(params))
  );

  server.tool(
    'bls_list_series',
    'List all available national BLS series with their IDs and descriptions.',
    async () => listSeries(client)
  );

  server.tool(
    'bls_get_all_data',
    'Summarise every cached BLS series (latest value, period, record count) for broad analysis.',
    async () => getAllData(client)
  );

  server.tool(
    'bls_get_state_data',
    'Get LAUS unemployment, employment or labor force data for a US state by name, abbreviation or FIPS code.',
    getStateDataSchema.shape,
    async (params) => getStateData(client, getStateDataSchema.parse(params))
  );

  server.tool(
    'bls_get_county_data',
    'Get LAUS data (not seasonally adjusted) for a US county by its 5-digit FIPS code.',
    getCountyDataSchema.shape,
    async (params) => getCountyData(client, getCountyDataSchema.parse(params))
  );

  server.tool(
    'bls_list_states',
    'List US states with abbreviations, FIPS codes and an example LAUS series ID.',
    async () => listStates(client)
  );

  server.server.onerror = (error) => console.error('[bls-mcp]', error);
  return server;
}
