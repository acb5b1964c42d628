#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  LOOKUP_RDATA_IP,
  LOOKUP_RDATA_NAME,
  LOOKUP_RDATA_RAW,
  LOOKUP_RRSET,
  OUTPUT_JSON,
  OUTPUT_TEXT,
  TIME_FIRST_AFTER,
  TIME_FIRST_BEFORE,
  TIME_LAST_AFTER,
  TIME_LAST_BEFORE,
} from './constants.js';
import { findConfigFiles, loadConfig } from './config.js';
import { ConfigurationError, toDnsdbError } from './errors.js';
import { filterAfter, filterBefore, sortRecords } from './filters.js';
import { getFormatter, rdataToText, rrsetToText } from './format.js';
import { DnsdbClient } from './index.js';
import { splitRaw, splitRdata, splitRrset } from './lookups.js';
import type { DnsdbRecord, RdataRecord, RrsetRecord } from './records.js';
import { parseTime } from './time.js';
import type { DnsdbQuery, FetchFunction, OutputFormat, TimeFence } from './types.js';
import { encodeRdata } from './wire.js';

const PROGRAM = 'dnsdb-query';

export const USAGE = `Usage: ${PROGRAM} [options]

Lookups (one of):
  -r, --rrset ONAME[/RRTYPE[/BAILIWICK]]   rrset lookup by owner name
  -n, --rdataname NAME[/RRTYPE]            rdata lookup by name
  -i, --rdataip IP|RANGE|PREFIX            rdata lookup by IP address
  -x, --rdataraw HEX[/RRTYPE]              rdata lookup by raw wire-format hex
      --encode                             read -x as RRTYPE/VALUE and encode it to hex

Options:
  -c, --config FILE         config file, may be repeated
                            (default: /etc/dnsdb-query.conf, ~/.dnsdb-query.conf)
  -l, --limit N             limit number of results
  -s, --sort KEY            sort by a result field
  -R, --reverse             reverse sort
  -j, --json                output in JSON format
      --before TIME         only output results seen before this time
      --after TIME          only output results seen after this time
      --time-first-before TIME
      --time-first-after TIME
      --time-last-before TIME
      --time-last-after TIME
                            server-side time fencing
  -t, --timeout MS          request timeout in milliseconds
  -v, --verbose             print the request URL to stderr
  -h, --help                show this help

TIME is epoch seconds, YYYY-MM-DD or "YYYY-MM-DD HH:MM:SS" (UTC).
`;

// where the CLI writes, reads its environment and sends requests
export interface CliIo {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  env: NodeJS.ProcessEnv;
  fetch?: FetchFunction;
}

// parse argv, unknown options throw, usage and help are printed by main()
function parseCommandLine(argv: string[]) {
  return yargs(argv)
    .scriptName(PROGRAM)
    .option('config', { alias: 'c', type: 'string', array: true })
    .option('rrset', { alias: 'r', type: 'string' })
    .option('rdataname', { alias: 'n', type: 'string' })
    .option('rdataip', { alias: 'i', type: 'string' })
    .option('rdataraw', { alias: 'x', type: 'string' })
    .option('encode', { type: 'boolean' })
    .option('sort', { alias: 's', type: 'string' })
    .option('reverse', { alias: 'R', type: 'boolean' })
    .option('json', { alias: 'j', type: 'boolean' })
    .option('limit', { alias: 'l', type: 'string' })
    .option('before', { type: 'string' })
    .option('after', { type: 'string' })
    .option('time-first-before', { type: 'string' })
    .option('time-first-after', { type: 'string' })
    .option('time-last-before', { type: 'string' })
    .option('time-last-after', { type: 'string' })
    .option('timeout', { alias: 't', type: 'string' })
    .option('verbose', { alias: 'v', type: 'boolean' })
    .option('help', { alias: 'h', type: 'boolean' })
    .help(false)
    .version(false)
    .locale('en')
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new ConfigurationError(message);
    })
    .parseSync();
}

type CliValues = ReturnType<typeof parseCommandLine>;

// client-side filters and sort order
interface PostProcessing {
  sort?: string;
  reverse: boolean;
  before?: number;
  after?: number;
}

// parse a non-negative integer option
function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`Invalid ${name}: '${value}'`);
  }
  return parseInt(value, 10);
}

// the lookup for the first mode given, in the order -r, -n, -i, -x
function getQuery(values: CliValues): DnsdbQuery | null {
  if (values.rrset !== undefined) {
    return { mode: LOOKUP_RRSET, ...splitRrset(values.rrset) };
  }
  if (values.rdataname !== undefined) {
    return { mode: LOOKUP_RDATA_NAME, ...splitRdata(values.rdataname) };
  }
  if (values.rdataip !== undefined) {
    return { mode: LOOKUP_RDATA_IP, ip: values.rdataip };
  }
  if (values.rdataraw !== undefined) {
    if (values.encode) {
      // RRTYPE/VALUE, the value may contain slashes
      const slash = values.rdataraw.indexOf('/');
      if (slash <= 0) {
        throw new ConfigurationError(`Invalid rdata to encode: '${values.rdataraw}'`);
      }
      const rrtype = values.rdataraw.slice(0, slash).toUpperCase();
      const hex = encodeRdata(rrtype, values.rdataraw.slice(slash + 1));
      return { mode: LOOKUP_RDATA_RAW, hex, rrtype };
    }
    return { mode: LOOKUP_RDATA_RAW, ...splitRaw(values.rdataraw) };
  }
  return null;
}

// server-side time fences given on the command line
function getTimeFence(values: CliValues): TimeFence {
  const fence: TimeFence = {};
  const fences = [
    [TIME_FIRST_BEFORE, values['time-first-before']],
    [TIME_FIRST_AFTER, values['time-first-after']],
    [TIME_LAST_BEFORE, values['time-last-before']],
    [TIME_LAST_AFTER, values['time-last-after']],
  ] as const;
  for (const [param, value] of fences) {
    if (value !== undefined) {
      fence[param] = parseTime(value);
    }
  }
  return fence;
}

// sort first, then filter
function postProcess<T extends DnsdbRecord>(records: T[], steps: PostProcessing): T[] {
  let results = records;
  if (steps.sort !== undefined) {
    results = sortRecords(results, steps.sort, steps.reverse);
  }
  if (steps.before !== undefined) {
    results = filterBefore(results, steps.before);
  }
  if (steps.after !== undefined) {
    results = filterAfter(results, steps.after);
  }
  return results;
}

// run the command line, returns the exit code
export async function main(
  argv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr, env: process.env }
): Promise<number> {
  let values: CliValues;
  try {
    values = parseCommandLine(argv);
  } catch (error) {
    io.stderr.write(`${PROGRAM}: ${toDnsdbError(error).message}\n${USAGE}`);
    return 1;
  }

  if (values.help) {
    io.stdout.write(USAGE);
    return 0;
  }
  if (values._.length > 0) {
    io.stderr.write(USAGE);
    return 1;
  }

  try {
    const query = getQuery(values);
    if (!query) {
      io.stderr.write(USAGE);
      return 1;
    }

    // parse times before making the request
    const steps: PostProcessing = {
      sort: values.sort,
      reverse: values.reverse ?? false,
      before: values.before === undefined ? undefined : parseTime(values.before),
      after: values.after === undefined ? undefined : parseTime(values.after),
    };

    const config = loadConfig(values.config ?? findConfigFiles(), io.env);
    const client = new DnsdbClient({
      server: config.server,
      apiKey: config.apiKey,
      limit: parseInteger('limit', values.limit, 0),
      timeFence: getTimeFence(values),
      ...(values.timeout !== undefined && { timeout: parseInteger('timeout', values.timeout, 0) }),
      ...(io.fetch && { fetch: io.fetch }),
    });

    if (values.verbose) {
      io.stderr.write(`;; GET ${client.buildUrl(query)}\n`);
    }

    const format: OutputFormat = values.json ? OUTPUT_JSON : OUTPUT_TEXT;
    let lines: string[];
    if (query.mode === LOOKUP_RRSET) {
      const records = postProcess(await client.lookup(query), steps);
      const formatter = getFormatter<RrsetRecord>(format, record => rrsetToText(record));
      lines = records.map(formatter);
    } else {
      const records = postProcess(await client.lookup(query), steps);
      const formatter = getFormatter<RdataRecord>(format, rdataToText);
      lines = records.map(formatter);
    }

    for (const line of lines) {
      io.stdout.write(`${line}\n`);
    }
    return 0;
  } catch (error) {
    io.stderr.write(`${PROGRAM}: ${toDnsdbError(error).message}\n`);
    return 1;
  }
}

if (require.main === module) {
  main(hideBin(process.argv)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${PROGRAM}: ${toDnsdbError(error).message}\n`);
      process.exitCode = 1;
    }
  );
}
