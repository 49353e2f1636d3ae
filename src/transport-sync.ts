/**
 * Blocking HTTP transport.
 *
 * Node has no synchronous HTTP client, so requests run on a worker thread
 * while the calling thread parks on `Atomics.wait`. The worker answers
 * through a dedicated `MessagePort` that the caller drains with
 * `receiveMessageOnPort`.
 *
 * @module transport-sync
 */

import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { z } from 'zod';
import { GitHubError } from './errors.js';
import { NoopLogger, type Logger } from './observability.js';
import type { SyncTransport, TransportRequest, TransportResponse } from './transport.js';

// Extra wait on top of the request timeout before the caller gives up.
const WAIT_MARGIN_MS = 1000;

const WORKER_SOURCE = `
const { workerData, parentPort } = require('node:worker_threads');
const { port, signal } = workerData;
const flag = new Int32Array(signal);

parentPort.on('message', async ({ id, request }) => {
  let reply;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeout);
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const headers = {};
    response.headers.forEach((value, key) => { headers[key.toLowerCase()] = value; });
    reply = { id, ok: true, status: response.status, headers, body: await response.text() };
  } catch (error) {
    const message = controller.signal.aborted
      ? 'Request timed out after ' + request.timeout + 'ms'
      : 'Request failed: ' + (error && error.message ? error.message : String(error));
    reply = { id, ok: false, message };
  } finally {
    clearTimeout(timer);
  }
  port.postMessage(reply);
  Atomics.store(flag, 0, 1);
  Atomics.notify(flag, 0);
});
`;

const replySchema = z.discriminatedUnion('ok', [
  z.object({
    id: z.number(),
    ok: z.literal(true),
    status: z.number().int(),
    headers: z.record(z.string()),
    body: z.string(),
  }),
  z.object({
    id: z.number(),
    ok: z.literal(false),
    message: z.string(),
  }),
]);

/**
 * Options for {@link WorkerSyncTransport}.
 */
export interface WorkerSyncTransportOptions {
  logger?: Logger;
}

/**
 * Blocking transport that performs each request on a worker thread.
 */
export class WorkerSyncTransport implements SyncTransport {
  private readonly worker: Worker;
  private readonly port: MessagePort;
  private readonly flag: Int32Array;
  private readonly logger: Logger;
  private nextId = 1;
  private closed = false;

  constructor(options: WorkerSyncTransportOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.flag = new Int32Array(new SharedArrayBuffer(4));

    const { port1, port2 } = new MessageChannel();
    this.port = port1;
    this.worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { port: port2, signal: this.flag.buffer },
      transferList: [port2],
    });
    // Never keep the process alive for an idle client.
    this.worker.unref();
    this.port.unref();
  }

  send(request: TransportRequest): TransportResponse {
    if (this.closed) {
      throw new GitHubError('Transport is closed');
    }

    const id = this.nextId++;
    const deadline = Date.now() + request.timeout + WAIT_MARGIN_MS;
    Atomics.store(this.flag, 0, 0);
    this.worker.postMessage({ id, request });

    for (;;) {
      const received = receiveMessageOnPort(this.port);
      if (received !== undefined) {
        const reply = replySchema.parse(received.message);
        // Replies to calls that already timed out are discarded.
        if (reply.id !== id) {
          continue;
        }
        if (!reply.ok) {
          throw GitHubError.transport(reply.message, undefined);
        }
        return { status: reply.status, headers: reply.headers, body: reply.body };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw GitHubError.transport(`Request timed out after ${request.timeout}ms`, undefined);
      }
      Atomics.wait(this.flag, 0, 0, remaining);
      Atomics.store(this.flag, 0, 0);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.port.close();
    this.worker.terminate().catch((error: unknown) => {
      this.logger.warn('Failed to stop transport worker', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
