/**
 * WHOIS query client (RFC 3912)
 * One TCP connection per query, response read until the server closes it
 */

import { createConnection } from 'node:net';
import { QueryError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';

export const WHOIS_PORT = 43;

/**
 * Longest delay a Node.js timer honours; larger values fire after 1ms
 */
export const MAX_TIMEOUT = 2_147_483_647;

export interface QueryOptions {
  /**
   * Port to connect to
   * @default 43
   */
  port?: number;

  /**
   * Deadline for the whole query in milliseconds.
   * 0 waits until the server closes the connection, however long that takes.
   * Must be an integer from 0 to {@link MAX_TIMEOUT}.
   * @default 0
   */
  timeout?: number;

  /**
   * Cancels the query and closes the socket
   */
  signal?: AbortSignal;

  /**
   * @default 'utf8'
   */
  encoding?: BufferEncoding;

  logger?: Logger;
}

/**
 * Send `query` to `server` and return everything the server writes back.
 *
 * If the connection breaks after some bytes arrived, the partial text is
 * returned instead of an error.
 *
 * @example
 * ```typescript
 * const raw = await queryServer('whois.verisign-grs.com', 'domain example.com', { timeout: 10000 });
 * ```
 */
export async function queryServer(
  server: string,
  query: string,
  options: QueryOptions = {}
): Promise<string> {
  const {
    port = WHOIS_PORT,
    timeout = 0,
    signal,
    encoding = 'utf8',
    logger = silentLogger,
  } = options;

  if (!Number.isInteger(timeout) || timeout < 0 || timeout > MAX_TIMEOUT) {
    throw new QueryError(server, `WHOIS query timeout must be an integer from 0 to ${MAX_TIMEOUT}, got ${timeout}`, {
      code: 'ERR_OUT_OF_RANGE',
      retriable: false,
    });
  }

  if (signal?.aborted) {
    throw new QueryError(server, 'WHOIS query aborted', {
      code: 'ABORT_ERR',
      cause: signal.reason,
      retriable: false,
    });
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const socket = createConnection({ host: server, port }, () => {
      logger.debug({ server, port }, 'WHOIS connection established');
      socket.write(`${query}\r\n`);
    });

    const onAbort = () => {
      finish(new QueryError(server, 'WHOIS query aborted', {
        code: 'ABORT_ERR',
        cause: signal?.reason,
        retriable: false,
      }));
    };

    function finish(error?: QueryError): void {
      if (settled) return;
      settled = true;

      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();

      if (error) {
        reject(error);
        return;
      }
      resolve(Buffer.concat(chunks).toString(encoding));
    }

    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        finish(new QueryError(server, `WHOIS query timed out after ${timeout}ms`, { code: 'ETIMEDOUT' }));
      }, timeout);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;
    });

    socket.on('end', () => {
      logger.debug({ server, bytes: received }, 'WHOIS response complete');
      finish();
    });

    socket.on('error', (error: NodeJS.ErrnoException) => {
      if (received > 0) {
        logger.warn(
          { server, code: error.code, bytes: received },
          'WHOIS connection dropped mid-response, returning partial text'
        );
        finish();
        return;
      }

      const detail = error.message || error.code || 'Connection failed';
      finish(new QueryError(server, `WHOIS query to ${server} failed: ${detail}`, {
        code: error.code,
        cause: error,
      }));
    });

    // A close without 'end' or 'error' still ends the response
    socket.on('close', () => finish());
  });
}
