import { DnsdbClient, DEFAULT_OPTIONS } from '../src/index.js';
import {
  AbortError,
  ConfigurationError,
  ConnectionError,
  ParsingError,
  QueryError,
  TimeoutError,
} from '../src/errors.js';
import {
  RDATA_MAIL,
  RDATA_WWW,
  RRSET_WWW,
  RRSET_ZONE,
  TEST_API_KEY,
  TEST_SERVER,
  getRequest,
  hangingFetch,
  mockFetch,
  ndjson,
  stallingFetch,
  streamResponse,
} from './dnsdb-test-helpers.js';

describe('DnsdbClient', () => {
  describe('Options', () => {
    test('should merge defaults', () => {
      const client = new DnsdbClient({ apiKey: TEST_API_KEY });
      expect(client.options.server).toBe(DEFAULT_OPTIONS.server);
      expect(client.options.limit).toBe(0);
      expect(client.options.timeout).toBe(30_000);
      expect(client.options.timeFence).toEqual({});
    });

    test('should use defaults for options left undefined', () => {
      const client = new DnsdbClient({
        apiKey: TEST_API_KEY,
        server: undefined,
        limit: undefined,
        timeout: undefined,
        timeFence: undefined,
        fetch: undefined,
      });
      expect(client.options.server).toBe(DEFAULT_OPTIONS.server);
      expect(client.options.limit).toBe(0);
      expect(client.options.timeout).toBe(30_000);
      expect(client.options.timeFence).toEqual({});
      expect(typeof client.options.fetch).toBe('function');
    });

    test('should require an API key', () => {
      expect(() => new DnsdbClient({ apiKey: '' })).toThrow(ConfigurationError);
      expect(() => new DnsdbClient({ apiKey: '  ' })).toThrow('An API key is required');
    });

    test('should reject invalid servers, limits and timeouts', () => {
      expect(() => new DnsdbClient({ apiKey: TEST_API_KEY, server: 'dnsdb.example.test' })).toThrow(
        'Invalid DNSDB server configured: dnsdb.example.test'
      );
      expect(() => new DnsdbClient({ apiKey: TEST_API_KEY, server: 'http://' })).toThrow(
        'Invalid DNSDB server configured: http://'
      );
      expect(() => new DnsdbClient({ apiKey: TEST_API_KEY, server: 'ftp://dnsdb.example.test' })).toThrow(
        'Invalid DNSDB server configured: ftp://dnsdb.example.test'
      );
      expect(() => new DnsdbClient({ apiKey: TEST_API_KEY, limit: -1 })).toThrow('Invalid limit: -1');
      expect(() => new DnsdbClient({ apiKey: TEST_API_KEY, timeout: 0 })).toThrow(
        'Invalid timeout: 0'
      );
    });

    test('should build URLs with limit and time fences', () => {
      const client = new DnsdbClient({
        apiKey: TEST_API_KEY,
        server: TEST_SERVER,
        limit: 5,
        timeFence: { time_last_after: 1380000000 },
      });
      expect(client.buildUrl({ mode: 'rrset', oname: 'www.example.com', rrtype: 'A' })).toBe(
        `${TEST_SERVER}/lookup/rrset/name/www.example.com/A?limit=5&time_last_after=1380000000`
      );
    });
  });

  describe('Lookups', () => {
    test('should send the API key and accept headers', async () => {
      const fetch = mockFetch(() => streamResponse([ndjson([RRSET_WWW])]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, server: TEST_SERVER, fetch });
      await client.queryRrset('www.example.com', 'A');

      expect(fetch).toHaveBeenCalledTimes(1);
      const request = getRequest(fetch);
      expect(request.url).toBe(`${TEST_SERVER}/lookup/rrset/name/www.example.com/A`);
      expect(request.headers).toEqual({ Accept: 'application/json', 'X-Api-Key': TEST_API_KEY });
    });

    test('should return rrset records', async () => {
      const fetch = mockFetch(() => streamResponse([ndjson([RRSET_WWW, RRSET_ZONE])]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, server: TEST_SERVER, fetch });
      const records = await client.queryRrset('example.com', undefined, 'com');

      expect(records).toEqual([RRSET_WWW, RRSET_ZONE]);
      expect(getRequest(fetch).url).toBe(`${TEST_SERVER}/lookup/rrset/name/example.com/ANY/com`);
    });

    test('should query rdata by name, IP and raw hex', async () => {
      const fetch = mockFetch(() => streamResponse([ndjson([RDATA_MAIL])]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, server: TEST_SERVER, fetch });

      expect(await client.queryRdataName('mail.example.com', 'A')).toEqual([RDATA_MAIL]);
      expect(await client.queryRdataIp('192.0.2.0/24')).toEqual([RDATA_MAIL]);
      expect(await client.queryRdataRaw('C0000219', 'A')).toEqual([RDATA_MAIL]);

      expect(getRequest(fetch, 0).url).toBe(`${TEST_SERVER}/lookup/rdata/name/mail.example.com/A`);
      expect(getRequest(fetch, 1).url).toBe(`${TEST_SERVER}/lookup/rdata/ip/192.0.2.0,24`);
      expect(getRequest(fetch, 2).url).toBe(`${TEST_SERVER}/lookup/rdata/raw/c0000219/A`);
    });

    test('should join lines split across chunks and skip blank lines', async () => {
      const body = ndjson([RDATA_MAIL, RDATA_WWW]);
      const cut = body.indexOf('rrname');
      const fetch = mockFetch(() => streamResponse([body.slice(0, cut), body.slice(cut), '\n\n']));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      expect(await client.lookup({ mode: 'rdata-ip', ip: '192.0.2.1' })).toEqual([
        RDATA_MAIL,
        RDATA_WWW,
      ]);
    });

    test('should read a last line without a newline', async () => {
      const fetch = mockFetch(() => streamResponse([JSON.stringify(RDATA_WWW)]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      expect(await client.queryRdataIp('192.0.2.1')).toEqual([RDATA_WWW]);
    });

    test('should stream records as they arrive', async () => {
      const fetch = mockFetch(() => streamResponse([ndjson([RDATA_MAIL, RDATA_WWW])]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      const names: string[] = [];
      for await (const record of client.stream({ mode: 'rdata-name', name: 'example.com' })) {
        names.push(record.rrname);
      }
      expect(names).toEqual(['mail.example.com.', 'www.example.com.']);
    });

    test('should stop reading when the consumer stops', async () => {
      const fetch = mockFetch(() => streamResponse([ndjson([RDATA_MAIL, RDATA_WWW])]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      const names: string[] = [];
      for await (const record of client.stream({ mode: 'rdata-ip', ip: '192.0.2.1' })) {
        names.push(record.rrname);
        break;
      }
      expect(names).toEqual(['mail.example.com.']);
    });
  });

  describe('Errors', () => {
    test('should treat 404 as no results', async () => {
      const fetch = mockFetch(() =>
        streamResponse(['Error: no results found for query.\n'], { status: 404 })
      );
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      expect(await client.queryRrset('nothing.example.com')).toEqual([]);
    });

    test('should raise QueryError for other statuses', async () => {
      const fetch = mockFetch(() =>
        streamResponse(['Error: API key not authorized.\n'], {
          status: 403,
          statusText: 'Forbidden',
        })
      );
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      const error = await client.queryRrset('www.example.com').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QueryError);
      expect(error).toMatchObject({ status: 403, code: 403 });
      expect(String(error)).toBe('QueryError: HTTP 403 Forbidden: Error: API key not authorized.');
    });

    test('should raise ParsingError for invalid lines', async () => {
      const fetch = mockFetch(() => streamResponse([`${JSON.stringify(RDATA_MAIL)}\nnot json\n`]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(ParsingError);
      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(/^Invalid JSON on line 2: /);
    });

    test('should count blank lines in ParsingError line numbers', async () => {
      const fetch = mockFetch(() => streamResponse([`\n\n${JSON.stringify(RDATA_MAIL)}\nnot json\n`]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(/^Invalid JSON on line 4: /);
    });

    test('should number a last line without a newline', async () => {
      const fetch = mockFetch(() => streamResponse([`${JSON.stringify(RDATA_MAIL)}\n\n{}`]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(/^Invalid record on line 3: /);
    });

    test('should raise ConnectionError for network failures', async () => {
      const fetch = jest.fn(async () => {
        throw new TypeError('fetch failed');
      });
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, server: TEST_SERVER, fetch });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(ConnectionError);
      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(
        `Failed to connect to ${TEST_SERVER}: TypeError: fetch failed`
      );
    });

    test('should raise TimeoutError when the request takes too long', async () => {
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, timeout: 20, fetch: hangingFetch() });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow(TimeoutError);
    });

    test('should raise TimeoutError when the body stalls', async () => {
      const fetch = stallingFetch([ndjson([RDATA_MAIL])]);
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, timeout: 30, fetch });

      const records: unknown[] = [];
      const reading = (async () => {
        for await (const record of client.stream({ mode: 'rdata-ip', ip: '192.0.2.25' })) {
          records.push(record);
        }
      })();
      await expect(reading).rejects.toThrow(TimeoutError);
      expect(records).toEqual([RDATA_MAIL]);
    });

    test('should raise AbortError when the caller aborts', async () => {
      const controller = new AbortController();
      const client = new DnsdbClient({
        apiKey: TEST_API_KEY,
        fetch: hangingFetch(),
        signal: controller.signal,
      });

      const pending = client.queryRdataIp('192.0.2.1');
      controller.abort();
      await expect(pending).rejects.toThrow(AbortError);
    });

    test('should not send a request once aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const fetch = mockFetch(() => streamResponse([]));
      const client = new DnsdbClient({ apiKey: TEST_API_KEY, fetch, signal: controller.signal });

      await expect(client.queryRdataIp('192.0.2.1')).rejects.toThrow('Query was aborted');
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});
