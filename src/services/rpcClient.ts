import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProtocolError, TransportError, ValidationError } from '../errors';
import { logger } from '../utils/logger';

export const API_PATH = 'api_jsonrpc.php';

const rpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.string().optional(),
});

export interface RpcRequestEnvelope {
  jsonrpc: '2.0';
  method: string;
  params: unknown;
  auth: string;
  id: number;
}

export interface RpcClientOptions {
  url: string;
  timeoutMs: number;
  legacyAuth?: boolean;
}

/**
 * Anything that can forward `<entity>.<method>` to the server.
 */
export interface RpcCaller {
  call(entity: string, method: string, params: unknown): Promise<unknown>;
}

export interface RpcSession extends RpcCaller {
  login(user: string, password: string): Promise<void>;
  logout(): Promise<void>;
}

function resolveEndpoint(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid monitoring server URL '${url}'`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Monitoring server URL must use http or https: '${url}'`);
  }

  return `${url.replace(/\/+$/, '')}/${API_PATH}`;
}

/**
 * JSON-RPC 2.0 client for the monitoring server API
 * Holds the session token and the request id counter for one run
 */
export class RpcClient implements RpcSession {
  public readonly endpoint: string;
  private readonly http: AxiosInstance;
  private readonly legacyAuth: boolean;
  private auth = '';
  private id = 0;

  constructor(options: RpcClientOptions) {
    this.endpoint = resolveEndpoint(options.url);
    this.legacyAuth = options.legacyAuth ?? false;
    this.http = axios.create({
      timeout: options.timeoutMs,
      headers: { 'Content-Type': 'application/json-rpc' },
      // Status and body are checked here rather than by axios
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
    });
  }

  public get token(): string {
    return this.auth;
  }

  public get requestId(): number {
    return this.id;
  }

  public async login(user: string, password: string): Promise<void> {
    this.auth = '';

    const result = this.legacyAuth
      ? await this.request('user.authenticate', { user, password })
      : await this.request('user.login', { username: user, password });

    if (typeof result !== 'string' || result.length === 0) {
      throw new ProtocolError(`Login as '${user}' returned no session token`);
    }

    this.auth = result;
    logger.debug('Authenticated against monitoring server', { user, endpoint: this.endpoint });
  }

  public async logout(): Promise<void> {
    if (!this.auth) {
      return;
    }

    await this.request('user.logout', []);
    this.auth = '';
  }

  public call(entity: string, method: string, params: unknown): Promise<unknown> {
    return this.request(`${entity}.${method}`, params);
  }

  public async request(method: string, params: unknown): Promise<unknown> {
    const envelope: RpcRequestEnvelope = {
      jsonrpc: '2.0',
      method,
      params,
      auth: this.auth,
      id: this.id,
    };

    try {
      logger.http('Sending RPC request', { method, id: envelope.id });
      const body = await this.post(envelope);
      return this.parseResponse(method, body);
    } finally {
      this.id += 1;
    }
  }

  private async post(envelope: RpcRequestEnvelope): Promise<string> {
    let response: { status: number; data: unknown };
    try {
      response = await this.http.post(this.endpoint, JSON.stringify(envelope));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Unable to reach ${this.endpoint} for ${envelope.method}: ${reason}`);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(
        `${envelope.method} failed with HTTP status ${response.status}`,
        response.status
      );
    }

    return typeof response.data === 'string' ? response.data : '';
  }

  private parseResponse(method: string, body: string): unknown {
    if (body.trim().length === 0) {
      throw new ProtocolError(`${method} returned an empty response body`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProtocolError(`${method} returned invalid JSON: ${reason}`);
    }

    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new ProtocolError(`${method} returned a response that is not a JSON-RPC object`);
    }

    if ('error' in payload && payload.error != null) {
      const rpcError = rpcErrorSchema.safeParse(payload.error);
      if (!rpcError.success) {
        throw new ProtocolError(`${method} failed with an unreadable error object`);
      }

      const { code, message, data } = rpcError.data;
      throw new ProtocolError(
        `${method} failed: Error ${code}: ${message}${data ? `, ${data}` : ''}`,
        code,
        data
      );
    }

    if (!('result' in payload)) {
      throw new ProtocolError(`${method} returned neither a result nor an error`);
    }

    return payload.result;
  }
}
