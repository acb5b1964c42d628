import { z } from 'zod';
import { ParsingError } from './errors.js';

// timestamps are epoch seconds
const epoch = z.number().int();

// fields shared by rrset and rdata results
const resultFields = {
  rrname: z.string(),
  rrtype: z.string(),
  count: z.number().int().nonnegative().optional(),
  time_first: epoch.optional(),
  time_last: epoch.optional(),
  zone_time_first: epoch.optional(),
  zone_time_last: epoch.optional(),
};

// a result of an rrset lookup, one rrset with all of its rdata
export const rrsetRecordSchema = z
  .object({
    ...resultFields,
    bailiwick: z.string().optional(),
    rdata: z.array(z.string()),
  })
  .passthrough();

// a result of an rdata lookup, one rdata value with the name that had it
export const rdataRecordSchema = z
  .object({
    ...resultFields,
    rdata: z.string(),
  })
  .passthrough();

export type RrsetRecord = z.infer<typeof rrsetRecordSchema>;
export type RdataRecord = z.infer<typeof rdataRecordSchema>;
export type DnsdbRecord = RrsetRecord | RdataRecord;

// parse one line of a newline-delimited JSON response against a record schema
export function parseRecordLine<T extends DnsdbRecord>(
  line: string,
  lineNumber: number,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new ParsingError(`Invalid JSON on line ${lineNumber}: ${String(error)}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParsingError(`Invalid record on line ${lineNumber}: ${issues}`);
  }
  return result.data;
}
