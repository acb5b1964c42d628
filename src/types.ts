import type {
  LOOKUP_RDATA_IP,
  LOOKUP_RDATA_NAME,
  LOOKUP_RDATA_RAW,
  LOOKUP_RRSET,
  OUTPUT_FORMATS,
  TIME_FENCE_PARAMS,
} from './constants.js';

// the fetch function used for requests, injectable for tests
export type FetchFunction = typeof fetch;

// configuration options for DnsdbClient
// external API uses DnsdbClientOptions, internal uses full DnsdbOptions
export interface DnsdbOptions {
  server: string; // API base URL (default: https://api.dnsdb.info)
  apiKey: string; // sent as the X-Api-Key header
  limit: number; // max results returned by the server, 0 for the server default
  timeout: number; // timeout in ms for the whole request and response body (default: 30000)
  timeFence: TimeFence; // server-side time fencing
  fetch: FetchFunction; // fetch implementation (default: global fetch)
  signal?: AbortSignal; // for cancellation
}

// only the API key is required
export type DnsdbClientOptions = Partial<DnsdbOptions> & Pick<DnsdbOptions, 'apiKey'>;

// a server-side time fence name, e.g. 'time_first_before'
export type TimeFenceParam = (typeof TIME_FENCE_PARAMS)[number];

// epoch seconds for each time fence that is set
export type TimeFence = Partial<Record<TimeFenceParam, number>>;

// an output format, 'text' or 'json'
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

// rrset/name/<oname>[/<rrtype>[/<bailiwick>]]
export interface RrsetQuery {
  mode: typeof LOOKUP_RRSET;
  oname: string;
  rrtype?: string;
  bailiwick?: string;
}

// rdata/name/<name>[/<rrtype>]
export interface RdataNameQuery {
  mode: typeof LOOKUP_RDATA_NAME;
  name: string;
  rrtype?: string;
}

// rdata/ip/<ip|range|prefix>
export interface RdataIpQuery {
  mode: typeof LOOKUP_RDATA_IP;
  ip: string;
}

// rdata/raw/<hex>[/<rrtype>]
export interface RdataRawQuery {
  mode: typeof LOOKUP_RDATA_RAW;
  hex: string;
  rrtype?: string;
}

// any of the four lookups
export type DnsdbQuery = RrsetQuery | RdataNameQuery | RdataIpQuery | RdataRawQuery;

// the queries that return rdata records
export type RdataQuery = RdataNameQuery | RdataIpQuery | RdataRawQuery;
