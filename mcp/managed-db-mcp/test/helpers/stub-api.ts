/**
 * In-process stand-in for the Managed DB API.
 *
 * Listens on an ephemeral 127.0.0.1 port under /api, records every request
 * and answers from a table of canned replies keyed by "METHOD /path".
 */

import express, { type Request, type Response } from 'express';
import { listen } from './listen.js';

export interface RecordedRequest {
  method: string;
  path: string;
  query: Request['query'];
  body: unknown;
  headers: Request['headers'];
}

export interface StubReply {
  status?: number;
  /** JSON body; omitted means an empty body. */
  body?: unknown;
  /** Raw text body, sent instead of `body`. */
  text?: string;
  delayMs?: number;
}

export interface StubApi {
  baseUrl: string;
  requests: RecordedRequest[];
  reply(method: string, path: string, reply: StubReply): void;
  close(): Promise<void>;
}

function send(res: Response, reply: StubReply): void {
  const status = reply.status ?? 200;
  if (reply.text !== undefined) {
    res.status(status).type('text/plain').send(reply.text);
  } else if (reply.body !== undefined) {
    res.status(status).json(reply.body);
  } else {
    res.status(status).end();
  }
}

export async function startStubApi(): Promise<StubApi> {
  const requests: RecordedRequest[] = [];
  const replies = new Map<string, StubReply>();

  const app = express();
  app.use(express.json());
  app.use('/api', (req: Request, res: Response) => {
    requests.push({
      method: req.method,
      path: req.path,
      query: req.query,
      body: req.body,
      headers: req.headers,
    });

    const reply = replies.get(`${req.method} ${req.path}`);
    if (!reply) {
      res.status(404).json({ detail: 'Not Found' });
      return;
    }
    if (reply.delayMs) {
      setTimeout(() => {
        if (!res.writableEnded && !res.destroyed) send(res, reply);
      }, reply.delayMs);
      return;
    }
    send(res, reply);
  });

  const running = await listen(app);

  return {
    baseUrl: `${running.origin}/api`,
    requests,
    reply(method, path, reply) {
      replies.set(`${method} ${path}`, reply);
    },
    close: () => running.close(),
  };
}
