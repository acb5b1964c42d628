import { ConfigurationError } from './errors.js';
import type { DnsdbRecord } from './records.js';

// compare two field values: numbers numerically, everything else by string code units
function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = typeof a === 'string' ? a : String(JSON.stringify(a));
  const right = typeof b === 'string' ? b : String(JSON.stringify(b));
  return left < right ? -1 : left > right ? 1 : 0;
}

// stable sort by a field of the records, the field must exist on the first record
export function sortRecords<T extends DnsdbRecord>(records: T[], key: string, reverse = false): T[] {
  if (records.length === 0) {
    return records;
  }
  if (!(key in records[0])) {
    const validKeys = Object.keys(records[0]).sort().join(', ');
    throw new ConfigurationError(`invalid sort key "${key}". valid sort keys are ${validKeys}`);
  }
  const direction = reverse ? -1 : 1;
  const valueOf = (record: DnsdbRecord): unknown => record[key];
  return [...records].sort((a, b) => direction * compareValues(valueOf(a), valueOf(b)));
}

// keep records first seen before the given time (records without timestamps are kept)
export function filterBefore<T extends DnsdbRecord>(records: T[], before: number): T[] {
  return records.filter(record => {
    if (record.time_first !== undefined) {
      return record.time_first < before;
    }
    if (record.zone_time_first !== undefined) {
      return record.zone_time_first < before;
    }
    return true;
  });
}

// keep records last seen after the given time (records without timestamps are kept)
export function filterAfter<T extends DnsdbRecord>(records: T[], after: number): T[] {
  return records.filter(record => {
    if (record.time_last !== undefined) {
      return record.time_last > after;
    }
    if (record.zone_time_last !== undefined) {
      return record.zone_time_last > after;
    }
    return true;
  });
}
