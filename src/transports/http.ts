import {
  ACCEPT_JSON,
  HEADER_ACCEPT,
  HEADER_API_KEY,
  HTTP_NOT_FOUND,
} from '../constants.js';
import { AbortError, ConnectionError, QueryError, TimeoutError } from '../errors.js';
import type { DnsdbOptions } from '../types.js';

// fetch() throws DOMException (in Node.js) or Error with name 'AbortError' when aborted
function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

// a non-empty line of the response body, numbered from 1 counting blank lines
export interface BodyLine {
  text: string;
  lineNumber: number;
}

// GET a lookup URL and yield the non-empty lines of the newline-delimited JSON response
// the timeout covers the request and reading the whole body
export async function* httpLookup(
  url: string,
  options: DnsdbOptions
): AsyncGenerator<BodyLine, void, undefined> {
  // setup abort controller with external signal linking
  const controller = new AbortController();

  // check if external signal is already aborted
  if (options.signal?.aborted) {
    throw new AbortError('Query was aborted');
  }

  // link external signal
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort);

  // internal timeout
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    let response: Response;
    try {
      response = await options.fetch(url, {
        method: 'GET',
        headers: {
          [HEADER_ACCEPT]: ACCEPT_JSON,
          [HEADER_API_KEY]: options.apiKey,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new ConnectionError(`Failed to connect to ${new URL(url).origin}: ${String(error)}`);
    }

    // DNSDB answers 404 for a lookup without results
    if (response.status === HTTP_NOT_FOUND) {
      await response.body?.cancel();
      return;
    }

    if (!response.ok) {
      throw new QueryError(response.status, response.statusText, await response.text());
    }

    if (!response.body) {
      return;
    }

    // split the streamed body into lines, a line may span chunks
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffered = '';
    let lineNumber = 0;
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        buffered += decoder.decode(value, { stream: true });

        let newline = buffered.indexOf('\n');
        while (newline !== -1) {
          const text = buffered.slice(0, newline).trim();
          buffered = buffered.slice(newline + 1);
          lineNumber++;
          if (text) yield { text, lineNumber };
          newline = buffered.indexOf('\n');
        }
      }
    } finally {
      // the consumer stopped early or the read failed, close the connection
      if (!finished) await reader.cancel();
    }

    // the last line may not end with a newline
    const last = (buffered + decoder.decode()).trim();
    if (last) yield { text: last, lineNumber: lineNumber + 1 };
  } catch (error) {
    // handle abort errors - check if it was due to timeout or external abort
    if (isAbortError(error)) {
      // check if external signal was aborted (user cancellation)
      if (options.signal?.aborted) {
        throw new AbortError('Query was aborted');
      }
      // otherwise it was a timeout
      throw new TimeoutError(`Timeout for '${url}' after ${options.timeout}ms`);
    }
    // re-throw other errors as-is
    throw error;
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
