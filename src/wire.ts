import { isIPv4, isIPv6 } from 'net';
import dnsPacket, { type Answer } from 'dns-packet';
import { ConfigurationError } from './errors.js';

// dns-packet writes a 12 byte header, names are never compressed
const HEADER_LENGTH = 12;

// an answer for the root name: name (1) + type (2) + class (2) + ttl (4) + rdlength (2)
const ROOT_ANSWER_PREFIX = 11;

// a question ends with type (2) + class (2)
const QUESTION_SUFFIX = 4;

// rrtypes that can be encoded from their presentation form
export const ENCODABLE_RRTYPES = ['A', 'AAAA', 'CNAME', 'DNAME', 'NS', 'PTR', 'TXT', 'MX'] as const;

export type EncodableRrtype = (typeof ENCODABLE_RRTYPES)[number];

export function isEncodableRrtype(rrtype: string): rrtype is EncodableRrtype {
  return (ENCODABLE_RRTYPES as readonly string[]).includes(rrtype);
}

// build the dns-packet answer for a presentation-form value
function toAnswer(rrtype: EncodableRrtype, value: string): Answer {
  const name = '.';
  switch (rrtype) {
    case 'A':
      if (!isIPv4(value)) {
        throw new ConfigurationError(`Invalid IPv4 address: '${value}'`);
      }
      return { type: rrtype, name, data: value };
    case 'AAAA':
      if (!isIPv6(value)) {
        throw new ConfigurationError(`Invalid IPv6 address: '${value}'`);
      }
      return { type: rrtype, name, data: value };
    case 'CNAME':
    case 'DNAME':
    case 'NS':
    case 'PTR':
      return { type: rrtype, name, data: value };
    case 'TXT':
      // a quoted value is a single string, otherwise each word is one string
      return { type: rrtype, name, data: splitTxt(value) };
    case 'MX': {
      const [preference, exchange, ...rest] = value.trim().split(/\s+/);
      if (!exchange || rest.length > 0 || !/^\d+$/.test(preference)) {
        throw new ConfigurationError(`Invalid MX rdata: '${value}'`);
      }
      return { type: rrtype, name, data: { preference: parseInt(preference, 10), exchange } };
    }
  }
}

// split TXT presentation form into character-strings
function splitTxt(value: string): string[] {
  const quoted = value.match(/"((?:[^"\\]|\\.)*)"/g);
  if (quoted) {
    return quoted.map(str => str.slice(1, -1).replace(/\\(.)/g, '$1'));
  }
  return value.trim().split(/\s+/);
}

// encode presentation-form rdata into lowercase wire-format hex
export function encodeRdata(rrtype: string, value: string): string {
  const type = rrtype.toUpperCase();
  if (!isEncodableRrtype(type)) {
    throw new ConfigurationError(
      `Cannot encode rdata of type ${type}, supported types are ${ENCODABLE_RRTYPES.join(', ')}`
    );
  }

  const buf = dnsPacket.encode({ answers: [toAnswer(type, value)] });
  const offset = HEADER_LENGTH + ROOT_ANSWER_PREFIX;
  const rdlength = buf.readUInt16BE(offset - 2);
  return buf.subarray(offset, offset + rdlength).toString('hex');
}

// encode a domain name into lowercase wire-format hex
export function encodeName(name: string): string {
  const buf = dnsPacket.encode({ questions: [{ type: 'A', name }] });
  return buf.subarray(HEADER_LENGTH, buf.length - QUESTION_SUFFIX).toString('hex');
}
