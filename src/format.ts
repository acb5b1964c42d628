import { DEFAULT_LOCALE, OUTPUT_JSON } from './constants.js';
import type { DnsdbRecord, RdataRecord, RrsetRecord } from './records.js';
import type { OutputFormat } from './types.js';
import { formatTime } from './time.js';

// format an rrset result as passive DNS common output format text
// each line ends with a newline, so the caller's own newline leaves a blank line between rrsets
export function rrsetToText(record: RrsetRecord, locale: string = DEFAULT_LOCALE): string {
  const lines: string[] = [];

  if (record.bailiwick !== undefined) {
    lines.push(`;;  bailiwick: ${record.bailiwick}`);
  }
  if (record.count !== undefined) {
    lines.push(`;;      count: ${new Intl.NumberFormat(locale).format(record.count)}`);
  }
  if (record.time_first !== undefined) {
    lines.push(`;; first seen: ${formatTime(record.time_first)}`);
  }
  if (record.time_last !== undefined) {
    lines.push(`;;  last seen: ${formatTime(record.time_last)}`);
  }
  if (record.zone_time_first !== undefined) {
    lines.push(`;; first seen in zone file: ${formatTime(record.zone_time_first)}`);
  }
  if (record.zone_time_last !== undefined) {
    lines.push(`;;  last seen in zone file: ${formatTime(record.zone_time_last)}`);
  }
  for (const rdata of record.rdata) {
    lines.push(`${record.rrname} IN ${record.rrtype} ${rdata}`);
  }

  return lines.map(line => `${line}\n`).join('');
}

// format an rdata result as a single resource record line
export function rdataToText(record: RdataRecord): string {
  return `${record.rrname} IN ${record.rrtype} ${record.rdata}`;
}

// JSON lines output, the record as returned by the API
export function toJson(record: DnsdbRecord): string {
  return JSON.stringify(record);
}

// pick the formatter for a result kind and output format
export function getFormatter<T extends DnsdbRecord>(
  format: OutputFormat,
  text: (record: T) => string
): (record: T) => string {
  return format === OUTPUT_JSON ? toJson : text;
}
