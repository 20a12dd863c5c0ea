/**
 * HTTP Transport
 *
 * The pipeline talks to media hosts only through `HttpTransport`, so tests
 * can substitute an in-process fake. `UndiciTransport` is the production
 * implementation: one keep-alive Agent plus one ProxyAgent per proxy URL.
 */

import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import { TransportError } from '@mediastage/core';
import { createLogger, errorMessage } from '@mediastage/utils';

const log = createLogger({ component: 'transport' });

const MAX_REDIRECTIONS = 5;

export type HttpMethod = 'GET' | 'HEAD';

export interface HttpRequestOptions {
  method: HttpMethod;
  headers?: Record<string, string>;
  proxy?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Header names lower-cased, repeated values joined with ", " */
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array>;
  /** Release the connection without reading the rest of the body */
  discard(): Promise<void>;
}

export interface HttpTransport {
  /**
   * @throws TransportError on connection failure, timeout or abort
   */
  request(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}

function normalizeHeaders(headers: Dispatcher.ResponseData['headers']): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

async function* readBody(
  url: string,
  body: Dispatcher.ResponseData['body']
): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of body) {
      if (chunk instanceof Uint8Array) {
        yield chunk;
      }
    }
  } catch (error) {
    throw new TransportError(url, `body read failed: ${errorMessage(error)}`, error);
  }
}

export class UndiciTransport implements HttpTransport {
  private readonly agent: Agent;
  private readonly proxyAgents = new Map<string, ProxyAgent>();

  constructor(private readonly userAgent = 'mediastage/0.1') {
    this.agent = new Agent({ maxRedirections: MAX_REDIRECTIONS });
  }

  private dispatcherFor(proxy?: string): Dispatcher {
    if (!proxy) {
      return this.agent;
    }
    let agent = this.proxyAgents.get(proxy);
    if (!agent) {
      agent = new ProxyAgent({ uri: proxy, maxRedirections: MAX_REDIRECTIONS });
      this.proxyAgents.set(proxy, agent);
    }
    return agent;
  }

  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    try {
      const response = await request(url, {
        method: options.method,
        headers: { 'user-agent': this.userAgent, ...options.headers },
        dispatcher: this.dispatcherFor(options.proxy),
        signal,
      });

      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body: readBody(url, response.body),
        discard: async () => {
          await response.body.dump();
        },
      };
    } catch (error) {
      const reason = timeout.aborted ? `timed out after ${options.timeoutMs}ms` : errorMessage(error);
      throw new TransportError(url, reason, error);
    }
  }

  async close(): Promise<void> {
    const agents: Dispatcher[] = [this.agent, ...this.proxyAgents.values()];
    this.proxyAgents.clear();

    const results = await Promise.allSettled(agents.map((agent) => agent.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn({ error: errorMessage(result.reason) }, 'Failed to close HTTP agent');
      }
    }
  }
}
