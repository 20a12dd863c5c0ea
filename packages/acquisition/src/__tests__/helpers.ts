import { TransportError } from '@mediastage/core';
import type { HttpRequestOptions, HttpResponse, HttpTransport } from '../transport.js';

export const MB = 1024 * 1024;

export interface FakeRoute {
  status?: number;
  /** Overrides `status` for HEAD */
  headStatus?: number;
  headers?: Record<string, string>;
  /** Overrides `headers` for HEAD */
  headHeaders?: Record<string, string>;
  body?: string | Uint8Array;
  /** Throw a transport error instead of answering */
  fail?: string;
  /** Hold the response until released or aborted */
  hold?: Promise<void>;
}

export interface RecordedRequest {
  url: string;
  method: HttpRequestOptions['method'];
  headers: Record<string, string>;
  proxy?: string;
}

/**
 * In-process stand-in for the HTTP layer. Unknown URLs answer 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  closed = false;
  private readonly routes = new Map<string, FakeRoute>();

  route(url: string, route: FakeRoute): this {
    this.routes.set(url, route);
    return this;
  }

  /** Media file answering HEAD with `sizeBytes` and GET with a short body */
  media(url: string, contentType: string, sizeBytes: number, body = 'media-bytes'): this {
    return this.route(url, {
      headers: { 'content-type': contentType },
      headHeaders: { 'content-type': contentType, 'content-length': String(sizeBytes) },
      body,
    });
  }

  count(method?: HttpRequestOptions['method']): number {
    return this.requests.filter((request) => !method || request.method === method).length;
  }

  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, method: options.method, headers: options.headers ?? {}, proxy: options.proxy });

    if (options.signal?.aborted) {
      throw new TransportError(url, 'aborted');
    }

    const route = this.routes.get(url) ?? { status: 404, body: 'not found', headers: { 'content-type': 'text/plain' } };
    if (route.hold) {
      await waitOrAbort(route.hold, options.signal, url);
    }
    if (route.fail) {
      throw new TransportError(url, route.fail);
    }

    const isHead = options.method === 'HEAD';
    const status = isHead ? route.headStatus ?? route.status ?? 200 : route.status ?? 200;
    const headers = isHead ? route.headHeaders ?? route.headers ?? {} : route.headers ?? {};
    const payload = typeof route.body === 'string' ? Buffer.from(route.body) : route.body ?? new Uint8Array();

    async function* body(): AsyncGenerator<Uint8Array> {
      if (!isHead && payload.byteLength > 0) {
        yield payload;
      }
    }

    return {
      status,
      headers: Object.fromEntries(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value])),
      body: body(),
      discard: async () => {},
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function waitOrAbort(hold: Promise<void>, signal: AbortSignal | undefined, url: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => reject(new TransportError(url, 'aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });
    hold.then(
      () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      },
      reject
    );
  });
}

/** Promise plus its resolver */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
