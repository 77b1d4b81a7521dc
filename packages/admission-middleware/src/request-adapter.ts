import type { Request } from 'express';
import {
  bufferedBody,
  replayableBody,
  type BodySource,
  type SignedRequest,
} from '@attestgate/message-signatures';

/**
 * View an Express request as a SignedRequest.
 *
 * A body already buffered by `express.raw()` or `express.text()` is used as
 * is. Otherwise the stream is read on first use and the bytes are left on
 * `req.body` for the handlers that follow. A parser that skipped the request
 * (content type not matched) leaves `{}` on `req.body` and the stream unread,
 * so that case reads the stream too.
 */
export function toSignedRequest(req: Request): SignedRequest {
  const url = req.originalUrl || req.url;
  const queryStart = url.indexOf('?');

  return {
    method: req.method,
    scheme: req.protocol,
    authority: req.get('host') ?? '',
    path: queryStart === -1 ? url : url.slice(0, queryStart),
    query: queryStart === -1 ? '' : url.slice(queryStart + 1),
    headers: req.headers,
    body: requestBody(req),
  };
}

function requestBody(req: Request): BodySource {
  const body: unknown = req.body;

  if (Buffer.isBuffer(body)) {
    return bufferedBody(new Uint8Array(body));
  }
  if (typeof body === 'string') {
    return bufferedBody(body);
  }
  if (streamConsumed(req)) {
    return {
      read: async () => {
        throw new Error('Request body was consumed before message signature verification');
      },
    };
  }

  return replayableBody(async (signal) => {
    const bytes = await readStream(req, signal);
    req.body = Buffer.from(bytes);
    return bytes;
  });
}

/**
 * True once a body parser or an earlier reader took the bytes off the stream
 */
function streamConsumed(req: Request): boolean {
  // body-parser marks the requests it actually read
  const parsed = '_body' in req && req._body === true;
  return parsed || req.readableEnded;
}

/**
 * Collect the request stream. Rejects if the client disconnects or the
 * signal aborts before the body is complete.
 */
function readStream(req: Request, signal?: AbortSignal): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    const cleanup = () => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
      req.off('close', onClose);
      signal?.removeEventListener('abort', onAbort);
    };
    const onData = (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    };
    const onEnd = () => {
      cleanup();
      resolve(new Uint8Array(Buffer.concat(chunks)));
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const onClose = () => {
      cleanup();
      reject(new Error('Client closed the connection before the body was received'));
    };
    const onAbort = () => {
      cleanup();
      reject(signal?.reason ?? new Error('Body read aborted'));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
    req.on('close', onClose);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
