import { AxiosError, AxiosHeaders, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  form: Record<string, string>;
}

export type FakeReply =
  | { status: number; body: unknown }
  | { timeout: true }
  | { networkError: string };

type Handler = FakeReply | ((call: RecordedCall) => FakeReply);

function readHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(AxiosHeaders.from(config.headers).toJSON())) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
  }
  return out;
}

function readForm(data: unknown): Record<string, string> {
  // URLSearchParams bodies reach the adapter already serialized
  if (typeof data !== 'string' || data.startsWith('{')) return {};
  return Object.fromEntries(new URLSearchParams(data));
}

/**
 * In-process stand-in for the registration portal. Routes on "METHOD url"
 * (absolute url, as the clients send it) and records every request.
 */
export class FakePortal {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, Handler>();

  on(method: string, url: string, handler: Handler): this {
    this.routes.set(`${method.toUpperCase()} ${url}`, handler);
    return this;
  }

  callsTo(method: string, url: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method.toUpperCase() && call.url === url);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const call: RecordedCall = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      headers: readHeaders(config),
      form: readForm(config.data),
    };
    this.calls.push(call);

    const handler = this.routes.get(`${call.method} ${call.url}`);
    const reply: FakeReply = handler
      ? typeof handler === 'function'
        ? handler(call)
        : handler
      : { status: 404, body: { message: `No fake route for ${call.method} ${call.url}` } };

    if ('timeout' in reply) {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, AxiosError.ECONNABORTED, config);
    }
    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, AxiosError.ERR_NETWORK, config);
    }
    const response: AxiosResponse = {
      data: typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body),
      status: reply.status,
      statusText: String(reply.status),
      headers: { 'content-type': 'application/json' },
      config,
    };
    return response;
  };
}
