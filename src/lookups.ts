import {
  ANY_RRTYPE,
  DNSDB_RRTYPES,
  LOOKUP_RDATA_IP,
  LOOKUP_RDATA_NAME,
  LOOKUP_RDATA_RAW,
  LOOKUP_RRSET,
  TIME_FENCE_PARAMS,
} from './constants.js';
import { ConfigurationError } from './errors.js';
import type { DnsdbQuery, TimeFence } from './types.js';

// escape regex metacharacters (NSAP-PTR has a dash)
const escapeRegex = (str: string) => str.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');

// matches the first "/<RRTYPE>" segment, followed by the end or another slash
const RRTYPE_SEGMENT = new RegExp(`/(${DNSDB_RRTYPES.map(escapeRegex).join('|')})(?:$|/)`, 'i');

// even-length hex, at least one byte
const HEX_PATTERN = /^(?:[0-9a-f]{2})+$/i;

// split "<before>/<RRTYPE>[/<after>]" at the first known rrtype segment
function splitAtRrtype(arg: string): [string, string?, string?] {
  const match = RRTYPE_SEGMENT.exec(arg);
  if (!match) {
    return [arg];
  }
  const before = arg.slice(0, match.index);
  const after = arg.slice(match.index + match[0].length);
  return [before, match[1].toUpperCase(), after];
}

// percent-encode everything but unreserved characters, slashes included
export function quote(str: string): string {
  return encodeURIComponent(str).replace(
    /[!'()*~]/g,
    char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

// parse "<ONAME>[/<RRTYPE>[/<BAILIWICK>]]"
export function splitRrset(arg: string): { oname: string; rrtype?: string; bailiwick?: string } {
  const [oname, rrtype, bailiwick] = splitAtRrtype(arg);
  return {
    oname,
    ...(rrtype && { rrtype }),
    ...(bailiwick && { bailiwick }),
  };
}

// parse "<NAME>[/<RRTYPE>]"
export function splitRdata(arg: string): { name: string; rrtype?: string } {
  const [name, rrtype, rest] = splitAtRrtype(arg);
  if (rest) {
    throw new ConfigurationError(`Invalid rrset: '${arg}'`);
  }
  return { name, ...(rrtype && { rrtype }) };
}

// parse "<HEX>[/<RRTYPE>]"
export function splitRaw(arg: string): { hex: string; rrtype?: string } {
  const [hex, rrtype, rest] = splitAtRrtype(arg);
  if (rest || !isHex(hex)) {
    throw new ConfigurationError(`Invalid raw rdata: '${arg}'`);
  }
  return { hex: hex.toLowerCase(), ...(rrtype && { rrtype }) };
}

// check for a non-empty, even-length hex string
export function isHex(str: string): boolean {
  return HEX_PATTERN.test(str);
}

// build the lookup path (without /lookup/) for a query
export function buildLookupPath(query: DnsdbQuery): string {
  switch (query.mode) {
    case LOOKUP_RRSET: {
      const oname = quote(query.oname);
      if (query.bailiwick) {
        // the bailiwick is the third segment, so the rrtype must be set
        return `rrset/name/${oname}/${query.rrtype ?? ANY_RRTYPE}/${quote(query.bailiwick)}`;
      }
      return query.rrtype ? `rrset/name/${oname}/${query.rrtype}` : `rrset/name/${oname}`;
    }
    case LOOKUP_RDATA_NAME: {
      const name = quote(query.name);
      return query.rrtype ? `rdata/name/${name}/${query.rrtype}` : `rdata/name/${name}`;
    }
    case LOOKUP_RDATA_IP:
      // prefixes are written with a comma, e.g. 192.0.2.0,24
      return `rdata/ip/${query.ip.replace(/\//g, ',')}`;
    case LOOKUP_RDATA_RAW: {
      if (!isHex(query.hex)) {
        throw new ConfigurationError(`Invalid raw rdata: '${query.hex}'`);
      }
      const hex = query.hex.toLowerCase();
      return query.rrtype ? `rdata/raw/${hex}/${query.rrtype}` : `rdata/raw/${hex}`;
    }
  }
}

// build the full URL, with limit and time fencing parameters
export function buildLookupUrl(
  server: string,
  path: string,
  params: { limit?: number; timeFence?: TimeFence } = {}
): string {
  const search = new URLSearchParams();
  if (params.limit && params.limit > 0) {
    search.set('limit', String(params.limit));
  }
  for (const param of TIME_FENCE_PARAMS) {
    const value = params.timeFence?.[param];
    if (value !== undefined) {
      search.set(param, String(value));
    }
  }
  const base = `${server.replace(/\/+$/, '')}/lookup/${path}`;
  const queryString = search.toString();
  return queryString ? `${base}?${queryString}` : base;
}
