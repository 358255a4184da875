import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { CookieJar } from 'tough-cookie';
import { ErrorClassifier, type RawFailure } from '../core/errorClassifier.js';
import type { WikiError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import { logger } from '../util/logger.js';

export const RPC_PATH = 'lib/exe/jsonrpc.php';

export interface JsonRpcClientConfig {
  wikiUrl: string;
  jar: CookieJar;
  timeoutMs?: number;
  classifier?: ErrorClassifier;
  /** Replaces the HTTP transport; tests answer requests in process. */
  adapter?: AxiosRequestConfig['adapter'];
}

interface RpcErrorBody {
  code: number;
  message: string;
}

function shouldUseProxy(hostname: string): boolean {
  const noProxy = process.env.no_proxy || process.env.NO_PROXY || '';
  if (!noProxy) return true;

  const noProxyList = noProxy.split(',').map(entry => entry.trim());
  return !noProxyList.some(entry => {
    if (entry === hostname) return true;
    if (entry.startsWith('.') && hostname.endsWith(entry)) return true;
    if (hostname.endsWith('.' + entry)) return true;
    return false;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rpcErrorOf(body: unknown): RpcErrorBody | null {
  if (!isRecord(body) || !isRecord(body.error)) return null;
  const { code, message } = body.error;
  return {
    code: typeof code === 'number' ? code : 0,
    message: typeof message === 'string' ? message : 'unknown error'
  };
}

/**
 * JSON-RPC 2.0 transport for `<wiki>/lib/exe/jsonrpc.php`.
 *
 * Cookies come from, and go back into, the shared jar. `call` never throws:
 * every failure is classified into exactly one error kind.
 */
export class JsonRpcClient {
  private readonly client: AxiosInstance;
  private readonly jar: CookieJar;
  private readonly classifier: ErrorClassifier;
  private requestId = 1;
  readonly rpcUrl: string;

  constructor(config: JsonRpcClientConfig) {
    const baseUrl = config.wikiUrl.replace(/\/+$/, '');
    this.rpcUrl = `${baseUrl}/${RPC_PATH}`;
    this.jar = config.jar;
    this.classifier = config.classifier ?? new ErrorClassifier();

    const hostname = new URL(baseUrl).hostname;
    const axiosConfig: AxiosRequestConfig = {
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'User-Agent': 'git-remote-dokuwiki'
      },
      timeout: config.timeoutMs ?? 30000,
      adapter: config.adapter
    };

    if (shouldUseProxy(hostname) && (process.env.HTTP_PROXY || process.env.HTTPS_PROXY)) {
      logger.debug('Using proxy for requests to', { hostname });
    } else {
      axiosConfig.proxy = false;
    }

    this.client = axios.create(axiosConfig);

    this.client.interceptors.request.use(async (request) => {
      const cookie = await this.jar.getCookieString(this.rpcUrl);
      if (cookie) {
        request.headers.set('Cookie', cookie);
      }
      return request;
    });

    this.client.interceptors.response.use(
      async (response) => {
        await this.storeCookies(response.headers['set-cookie']);
        logger.debug('HTTP response', {
          status: response.status,
          size: typeof response.data === 'string' ? response.data.length : undefined
        });
        return response;
      },
      async (error: unknown) => {
        if (axios.isAxiosError(error)) {
          await this.storeCookies(error.response?.headers['set-cookie']);
          logger.debug('HTTP error', {
            status: error.response?.status,
            code: error.code,
            message: error.message
          });
        }
        return Promise.reject(error);
      }
    );
  }

  private async storeCookies(header: unknown): Promise<void> {
    const values = Array.isArray(header) ? header : typeof header === 'string' ? [header] : [];
    for (const value of values) {
      if (typeof value !== 'string') continue;
      await this.jar.setCookie(value, this.rpcUrl, { ignoreError: true });
    }
  }

  async call(method: string, params: Record<string, unknown> = {}): Promise<Result<unknown, WikiError>> {
    const id = this.requestId++;
    const started = Date.now();

    let body: unknown;
    try {
      const response = await this.client.post<unknown>(
        this.rpcUrl,
        { jsonrpc: '2.0', method, params, id },
        { responseType: 'text', transformResponse: (data: unknown) => data }
      );
      body = response.data;
    } catch (error) {
      return err(this.classifier.classify(this.describeFailure(method, error)));
    }

    const parsed = this.parseBody(method, body);
    logger.debug('RPC call', { method, id, ok: parsed.ok, durationMs: Date.now() - started });
    return parsed;
  }

  private parseBody(method: string, body: unknown): Result<unknown, WikiError> {
    let payload: unknown = body;
    if (typeof body === 'string') {
      try {
        payload = JSON.parse(body);
      } catch (error) {
        return err(this.classifier.classify({
          method,
          message: `malformed response: ${body.slice(0, 200)}`,
          cause: error
        }));
      }
    }

    const rpcError = rpcErrorOf(payload);
    if (rpcError) {
      return err(this.classifier.classify({
        method,
        message: rpcError.message,
        rpcCode: rpcError.code
      }));
    }

    if (!isRecord(payload) || !('result' in payload)) {
      return err(this.classifier.classify({ method, message: 'response has no result' }));
    }
    return ok(payload.result);
  }

  private describeFailure(method: string, error: unknown): RawFailure {
    if (!axios.isAxiosError(error)) {
      return {
        method,
        message: error instanceof Error ? error.message : String(error),
        cause: error
      };
    }

    const data: unknown = error.response?.data;
    let rpcError: RpcErrorBody | null = null;
    if (typeof data === 'string') {
      try {
        rpcError = rpcErrorOf(JSON.parse(data));
      } catch {
        rpcError = null;
      }
    }

    return {
      method,
      message: rpcError?.message ?? error.message,
      status: error.response?.status,
      rpcCode: rpcError?.code,
      networkCode: error.response ? undefined : error.code,
      cause: error
    };
  }
}
