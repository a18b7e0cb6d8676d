import axios, {
  type AxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
  type CreateAxiosDefaults,
} from "axios";
import { formatErrorMessage, formatPayloadForDebug, loggerFor, payloadByteLength, type PrefixedLogger } from "./logger.js";

type RequestMeta = {
  startedAt: number;
  method: string;
  url: string;
  body?: unknown;
};

/**
 * Axios instance that logs one summary line per request
 * (`METHOD url status=… bytes=… latencyMs=…`) and, at debug level, the payloads.
 */
export function createLoggingHttpClient(
  defaults?: CreateAxiosDefaults,
  logger: PrefixedLogger = loggerFor("http"),
): AxiosInstance {
  const http = axios.create(defaults);
  const inflight = new WeakMap<AxiosRequestConfig, RequestMeta>();

  http.interceptors.request.use((request) => {
    inflight.set(request, {
      startedAt: Date.now(),
      method: (request.method ?? "get").toUpperCase(),
      url: resolveUrl(request),
      body: request.data,
    });
    return request;
  });

  http.interceptors.response.use(
    (response) => {
      handleResponse(response, takeMeta(inflight, response.config), logger);
      return response;
    },
    (error: AxiosError) => {
      handleError(error, error.config ? takeMeta(inflight, error.config) : undefined, logger);
      return Promise.reject(error);
    },
  );

  return http;
}

function handleResponse(response: AxiosResponse, meta: RequestMeta | undefined, logger: PrefixedLogger): void {
  const latency = meta ? Date.now() - meta.startedAt : 0;
  const method = meta?.method ?? (response.config.method ?? "get").toUpperCase();
  const url = meta?.url ?? resolveUrl(response.config);
  const bytes = payloadByteLength(response.data);

  logger.info(`${method} ${url} status=${response.status} bytes=${bytes} latencyMs=${latency}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`request ${method} ${url}`, { body: formatPayloadForDebug(meta?.body) });
    logger.debug(`response ${method} ${url}`, {
      status: response.status,
      body: formatPayloadForDebug(response.data),
    });
  }
}

function handleError(error: AxiosError, meta: RequestMeta | undefined, logger: PrefixedLogger): void {
  const message = formatErrorMessage(error);
  if (!error.config) {
    logger.error(`UNKNOWN UNKNOWN status=ERR bytes=0 latencyMs=0 error=${message}`);
    return;
  }

  const latency = meta ? Date.now() - meta.startedAt : 0;
  const method = meta?.method ?? (error.config.method ?? "get").toUpperCase();
  const url = meta?.url ?? resolveUrl(error.config);
  const response = error.response;
  const status = response?.status ?? "ERR";
  const bytes = response ? payloadByteLength(response.data) : 0;

  logger.warn(`${method} ${url} status=${status} bytes=${bytes} latencyMs=${latency} error=${message}`);

  if (logger.isDebugEnabled()) {
    logger.debug(`error ${method} ${url}`, {
      status,
      body: response ? formatPayloadForDebug(response.data) : null,
      message,
    });
  }
}

function takeMeta(inflight: WeakMap<AxiosRequestConfig, RequestMeta>, config: AxiosRequestConfig): RequestMeta | undefined {
  const meta = inflight.get(config);
  inflight.delete(config);
  return meta;
}

function resolveUrl(config: AxiosRequestConfig): string {
  if (config.url && config.baseURL && !/^[a-z][a-z0-9+.-]*:\/\//i.test(config.url)) {
    return `${config.baseURL.replace(/\/+$/, "")}/${config.url.replace(/^\/+/, "")}`;
  }
  return config.url ?? config.baseURL ?? "UNKNOWN";
}
