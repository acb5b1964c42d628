import { homedir } from 'os';
import { join } from 'path';
import RRTYPES from './data/rrtypes.json';

// the default DNSDB API server to use if not configured
export const DEFAULT_DNSDB_SERVER = 'https://api.dnsdb.info';

// system-wide config first, per-user config second (later files override earlier ones)
export const SYSTEM_CONFIG_FILE = '/etc/dnsdb-query.conf';
export const USER_CONFIG_FILE = join(homedir(), '.dnsdb-query.conf');
export const DEFAULT_CONFIG_FILES = [SYSTEM_CONFIG_FILE, USER_CONFIG_FILE] as const;

// config keys, also read from the environment
export const CONFIG_SERVER = 'DNSDB_SERVER';
export const CONFIG_APIKEY = 'APIKEY';

// lookup modes
export const LOOKUP_RRSET = 'rrset'; // rrset/name/<oname>[/<rrtype>[/<bailiwick>]]
export const LOOKUP_RDATA_NAME = 'rdata-name'; // rdata/name/<name>[/<rrtype>]
export const LOOKUP_RDATA_IP = 'rdata-ip'; // rdata/ip/<ip|range|prefix>
export const LOOKUP_RDATA_RAW = 'rdata-raw'; // rdata/raw/<hex>[/<rrtype>]

// the rrtype used when a bailiwick is given without an rrtype
export const ANY_RRTYPE = 'ANY';

// request headers
export const HEADER_ACCEPT = 'Accept';
export const HEADER_API_KEY = 'X-Api-Key';
export const ACCEPT_JSON = 'application/json';

// server-side time fencing parameters, in the order they are appended to the URL
export const TIME_FIRST_BEFORE = 'time_first_before';
export const TIME_FIRST_AFTER = 'time_first_after';
export const TIME_LAST_BEFORE = 'time_last_before';
export const TIME_LAST_AFTER = 'time_last_after';
export const TIME_FENCE_PARAMS = [
  TIME_FIRST_BEFORE,
  TIME_FIRST_AFTER,
  TIME_LAST_BEFORE,
  TIME_LAST_AFTER,
] as const;

// output formats
export const OUTPUT_TEXT = 'text';
export const OUTPUT_JSON = 'json';
export const OUTPUT_FORMATS = [OUTPUT_TEXT, OUTPUT_JSON] as const;

// locale used for digit grouping in counts
export const DEFAULT_LOCALE = 'en-US';

// request timeout in ms, covers reading the whole response body
export const DEFAULT_TIMEOUT = 30_000;

// DNSDB answers 404 when a lookup has no results
export const HTTP_NOT_FOUND = 404;

// rrtypes recognized when splitting "<name>/<rrtype>[/<bailiwick>]" arguments
export const DNSDB_RRTYPES: readonly string[] = RRTYPES;
