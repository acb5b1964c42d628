import {
  DEFAULT_DNSDB_SERVER,
  DEFAULT_TIMEOUT,
  LOOKUP_RDATA_IP,
  LOOKUP_RDATA_NAME,
  LOOKUP_RDATA_RAW,
  LOOKUP_RRSET,
} from './constants.js';
import { ConfigurationError } from './errors.js';
import { buildLookupPath, buildLookupUrl } from './lookups.js';
import {
  parseRecordLine,
  rdataRecordSchema,
  rrsetRecordSchema,
  type DnsdbRecord,
  type RdataRecord,
  type RrsetRecord,
} from './records.js';
import { httpLookup } from './transports/http.js';
import type {
  DnsdbClientOptions,
  DnsdbOptions,
  DnsdbQuery,
  RdataQuery,
  RrsetQuery,
} from './types.js';

// default options for DnsdbClient
export const DEFAULT_OPTIONS: Omit<DnsdbOptions, 'apiKey' | 'fetch'> = {
  server: DEFAULT_DNSDB_SERVER, // API base URL
  limit: 0, // max results, 0 leaves it to the server
  timeout: DEFAULT_TIMEOUT, // timeout in ms
  timeFence: {}, // no server-side time fencing
};

// an absolute http(s) URL
function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export class DnsdbClient {
  // the client-level options
  options: DnsdbOptions;

  // setup client-level options
  constructor(opts: DnsdbClientOptions) {
    this.options = this.getOptions(opts);
  }

  // process partial options into full DnsdbOptions with all defaults
  protected getOptions(opts: DnsdbClientOptions): DnsdbOptions {
    // options left undefined fall back to the defaults
    const options: DnsdbOptions = {
      server: opts.server ?? DEFAULT_OPTIONS.server,
      apiKey: opts.apiKey,
      limit: opts.limit ?? DEFAULT_OPTIONS.limit,
      timeout: opts.timeout ?? DEFAULT_OPTIONS.timeout,
      timeFence: opts.timeFence ?? DEFAULT_OPTIONS.timeFence,
      fetch: opts.fetch ?? ((input, init) => fetch(input, init)),
      signal: opts.signal,
    };

    if (!options.apiKey || !options.apiKey.trim()) {
      throw new ConfigurationError('An API key is required');
    }
    if (!isHttpUrl(options.server)) {
      throw new ConfigurationError(`Invalid DNSDB server configured: ${options.server}`);
    }
    if (!Number.isInteger(options.limit) || options.limit < 0) {
      throw new ConfigurationError(`Invalid limit: ${options.limit}`);
    }
    if (!(options.timeout > 0)) {
      throw new ConfigurationError(`Invalid timeout: ${options.timeout}`);
    }
    return options;
  }

  // look up an rrset by owner name, with optional rrtype and bailiwick
  public async queryRrset(oname: string, rrtype?: string, bailiwick?: string): Promise<RrsetRecord[]> {
    return await this.lookup({ mode: LOOKUP_RRSET, oname, rrtype, bailiwick });
  }

  // look up names whose rdata contains a name, with optional rrtype
  public async queryRdataName(name: string, rrtype?: string): Promise<RdataRecord[]> {
    return await this.lookup({ mode: LOOKUP_RDATA_NAME, name, rrtype });
  }

  // look up names whose rdata contains an IP address, range or prefix
  public async queryRdataIp(ip: string): Promise<RdataRecord[]> {
    return await this.lookup({ mode: LOOKUP_RDATA_IP, ip });
  }

  // look up names whose rdata matches raw wire-format hex, with optional rrtype
  public async queryRdataRaw(hex: string, rrtype?: string): Promise<RdataRecord[]> {
    return await this.lookup({ mode: LOOKUP_RDATA_RAW, hex, rrtype });
  }

  // run any lookup and collect its records
  public lookup(query: RrsetQuery): Promise<RrsetRecord[]>;
  public lookup(query: RdataQuery): Promise<RdataRecord[]>;
  public lookup(query: DnsdbQuery): Promise<DnsdbRecord[]>;
  public async lookup(query: DnsdbQuery): Promise<DnsdbRecord[]> {
    const records: DnsdbRecord[] = [];
    for await (const record of this.stream(query)) {
      records.push(record);
    }
    return records;
  }

  // run any lookup and yield validated records as they arrive
  public stream(query: RrsetQuery): AsyncGenerator<RrsetRecord, void, undefined>;
  public stream(query: RdataQuery): AsyncGenerator<RdataRecord, void, undefined>;
  public stream(query: DnsdbQuery): AsyncGenerator<DnsdbRecord, void, undefined>;
  public async *stream(query: DnsdbQuery): AsyncGenerator<DnsdbRecord, void, undefined> {
    const url = this.buildUrl(query);
    const schema = query.mode === LOOKUP_RRSET ? rrsetRecordSchema : rdataRecordSchema;

    for await (const { text, lineNumber } of httpLookup(url, this.options)) {
      yield parseRecordLine<DnsdbRecord>(text, lineNumber, schema);
    }
  }

  // the URL a lookup requests, limit and time fences included
  public buildUrl(query: DnsdbQuery): string {
    return buildLookupUrl(this.options.server, buildLookupPath(query), {
      limit: this.options.limit,
      timeFence: this.options.timeFence,
    });
  }
}

// export types and constants
export type * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './lookups.js';
export * from './records.js';
export * from './time.js';
export * from './format.js';
export * from './filters.js';
export * from './wire.js';
export * from './config.js';
