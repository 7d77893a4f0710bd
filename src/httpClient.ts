import axios, { type AxiosError, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse, type CreateAxiosDefaults } from "axios";
import { formatErrorMessage, formatPayloadForDebug, loggerFor, payloadByteLength, type PrefixedLogger } from "./logger.js";

type RequestMeta = {
  startedAt: number;
  method: string;
  url: string;
  headers?: Record<string, unknown>;
  params?: unknown;
};

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export function createLoggingHttpClient(
  config: CreateAxiosDefaults = {},
  logger: PrefixedLogger = loggerFor("http"),
): AxiosInstance {
  const instance = axios.create(config);
  // Per-request and instance-level headers still take precedence over common ones.
  instance.defaults.headers.common["User-Agent"] = BROWSER_USER_AGENT;
  const inflight = new WeakMap<AxiosRequestConfig, RequestMeta>();

  instance.interceptors.request.use((request) => {
    inflight.set(request, {
      startedAt: Date.now(),
      method: (request.method ?? "get").toUpperCase(),
      url: resolveUrl(request),
      headers: request.headers ? request.headers.toJSON() : undefined,
      params: request.params,
    });
    return request;
  });

  instance.interceptors.response.use(
    (response) => {
      handleResponse(response, inflight, logger);
      return response;
    },
    (error: AxiosError) => {
      handleError(error, inflight, logger);
      return Promise.reject(error);
    },
  );

  return instance;
}

function handleResponse(
  response: AxiosResponse,
  inflight: WeakMap<AxiosRequestConfig, RequestMeta>,
  logger: PrefixedLogger,
): void {
  const meta = takeMeta(response.config, inflight);
  const latency = Date.now() - meta.startedAt;
  const bytes = payloadByteLength(response.data);

  logger.info(`${meta.method} ${meta.url} status=${response.status} bytes=${bytes} latencyMs=${latency}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`request ${meta.method} ${meta.url}`, {
      headers: meta.headers,
      query: meta.params,
    });
    logger.debug(`response ${meta.method} ${meta.url}`, {
      status: response.status,
      headers: response.headers ?? {},
      body: formatPayloadForDebug(response.data),
    });
  }
}

function handleError(error: AxiosError, inflight: WeakMap<AxiosRequestConfig, RequestMeta>, logger: PrefixedLogger): void {
  const config = error.config;
  if (!config) {
    logger.error(`UNKNOWN UNKNOWN status=ERR bytes=0 latencyMs=0 error=${formatErrorMessage(error)}`);
    return;
  }

  const meta = takeMeta(config, inflight);
  const latency = Date.now() - meta.startedAt;
  const response = error.response;
  const status = response?.status ?? "ERR";
  const bytes = response ? payloadByteLength(response.data) : 0;
  const message = formatErrorMessage(error);

  logger.warn(`${meta.method} ${meta.url} status=${status} bytes=${bytes} latencyMs=${latency} error=${message}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`error ${meta.method} ${meta.url}`, {
      status,
      headers: response?.headers ?? {},
      body: response ? formatPayloadForDebug(response.data) : null,
      message,
    });
  }
}

function takeMeta(config: AxiosRequestConfig, inflight: WeakMap<AxiosRequestConfig, RequestMeta>): RequestMeta {
  const meta = inflight.get(config);
  inflight.delete(config);
  return (
    meta ?? {
      startedAt: Date.now(),
      method: (config.method ?? "get").toUpperCase(),
      url: resolveUrl(config),
    }
  );
}

function resolveUrl(config: AxiosRequestConfig): string {
  if (config.url) return config.url;
  if (config.baseURL) return config.baseURL;
  return "UNKNOWN";
}
