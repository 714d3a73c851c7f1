import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

import { handleSlackRequest, type HandlerDeps } from './handler.js';
import { errorMessage } from './utils/errors.js';

export const MAX_BODY_BYTES = 512_000;

class BodyTooLargeError extends Error {
  constructor(maxBytes: number) {
    super(`Request body too large (max ${maxBytes} bytes)`);
    this.name = 'BodyTooLargeError';
  }
}

function readHeader(req: IncomingMessage, name: string): string | null {
  const value = req.headers[name];
  if (!value) return null;
  if (Array.isArray(value)) return value[0] ?? null;
  return value;
}

async function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  // Drain the whole body even past the limit
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total <= maxBytes) chunks.push(buf);
  }

  if (total > maxBytes) {
    throw new BodyTooLargeError(maxBytes);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function write(res: ServerResponse, status: number, body: string, contentType: string): void {
  res.statusCode = status;
  res.setHeader('content-type', contentType);
  res.end(body);
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  write(res, status, JSON.stringify(body), 'application/json; charset=utf-8');
}

export function createRelayServer(deps: HandlerDeps): Server {
  const { config, logger } = deps;

  return createServer(async (req, res) => {
    try {
      const path = new URL(req.url ?? '/', 'http://localhost').pathname;

      if (req.method === 'GET' && path === '/healthz') {
        writeJson(res, 200, { ok: true });
        return;
      }

      if (path !== config.eventsPath) {
        writeJson(res, 404, { ok: false, error: 'Not found' });
        return;
      }

      if (req.method !== 'POST') {
        res.setHeader('allow', 'POST');
        writeJson(res, 405, { ok: false, error: 'Method not allowed' });
        return;
      }

      const rawBody = await readBody(req, MAX_BODY_BYTES);
      const response = await handleSlackRequest(
        {
          rawBody,
          headers: {
            timestamp: readHeader(req, 'x-slack-request-timestamp'),
            signature: readHeader(req, 'x-slack-signature'),
          },
        },
        deps,
      );
      write(res, response.status, response.body, response.contentType);
    } catch (err: unknown) {
      if (err instanceof BodyTooLargeError) {
        logger.warn({ err: err.message }, 'Rejected oversized Slack request');
        writeJson(res, 413, { ok: false, error: err.message });
        return;
      }
      logger.error({ err: errorMessage(err) }, 'Slack events request failed');
      writeJson(res, 500, { ok: false, error: 'Internal server error' });
    }
  });
}

export async function runServer(deps: HandlerDeps): Promise<Server> {
  const server = createRelayServer(deps);
  const { host, port, eventsPath } = deps.config;

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  deps.logger.info({ host, port, eventsPath }, 'Slack relay listening');
  return server;
}
