/**
 * Framework-neutral view of an incoming HTTP request
 */

/**
 * Header multi-map, the shape of Node's IncomingHttpHeaders
 */
export type HeaderMap = Record<string, string | string[] | undefined>;

/**
 * Request body that can be read any number of times.
 * Every read resolves to the same bytes.
 */
export interface BodySource {
  read(signal?: AbortSignal): Promise<Uint8Array>;
}

export interface SignedRequest {
  method: string;
  scheme: string;
  /** Host and optional port, as the client addressed it */
  authority: string;
  /** Absolute path, without the query */
  path: string;
  /** Raw query string without the leading "?"; empty when absent */
  query: string;
  headers: HeaderMap;
  body: BodySource;
}

const EMPTY_BODY = new Uint8Array(0);

/**
 * Body source over bytes that are already in memory
 */
export function bufferedBody(bytes: Uint8Array | string = EMPTY_BODY): BodySource {
  const data = typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes;
  return {
    read: async (signal?: AbortSignal) => {
      signal?.throwIfAborted();
      return data;
    },
  };
}

/**
 * Wraps a one-shot reader so the underlying stream is consumed only once.
 * A failed or aborted read is not cached, so a later read may retry.
 */
export function replayableBody(readOnce: (signal?: AbortSignal) => Promise<Uint8Array>): BodySource {
  let pending: Promise<Uint8Array> | undefined;

  return {
    read: (signal?: AbortSignal) => {
      if (!pending) {
        pending = readOnce(signal).catch((error: unknown) => {
          pending = undefined;
          throw error;
        });
      }
      return pending;
    },
  };
}

/**
 * Build a SignedRequest from an absolute URL
 */
export function requestFromUrl(
  method: string,
  url: string,
  headers: HeaderMap = {},
  body: BodySource | Uint8Array | string = EMPTY_BODY
): SignedRequest {
  const parsed = new URL(url);
  return {
    method,
    scheme: parsed.protocol.replace(/:$/, ''),
    authority: parsed.host,
    path: parsed.pathname,
    query: parsed.search.replace(/^\?/, ''),
    headers,
    body: isBodySource(body) ? body : bufferedBody(body),
  };
}

function isBodySource(body: BodySource | Uint8Array | string): body is BodySource {
  return typeof body === 'object' && !(body instanceof Uint8Array);
}

/**
 * All values of a header (case-insensitive), one entry per field line.
 * Returns undefined when the header is absent.
 */
export function getHeaderValues(headers: HeaderMap, name: string): string[] | undefined {
  const wanted = name.toLowerCase();
  const values: string[] = [];
  let found = false;

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }
    found = true;
    if (Array.isArray(value)) {
      values.push(...value);
    } else {
      values.push(value);
    }
  }

  return found ? values : undefined;
}

/**
 * Trim every field line and join them with the given separator
 */
export function combineHeaderValues(values: string[], separator = ', '): string {
  return values.map((v) => v.trim()).join(separator);
}
