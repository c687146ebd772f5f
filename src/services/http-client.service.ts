// ============================================================================
// HTTP CLIENT SERVICE
// Axios-based XML transport with correlation headers and error mapping
// ============================================================================

import axios, { type AxiosAdapter, type AxiosError, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import { logger } from "../utils/logger.js";
import { context } from "../utils/context.js";
import { UpstreamApiError, UpstreamConnectionError, UpstreamTimeoutError } from "../errors/index.js";

export interface HttpClientConfig {
  baseURL: string;
  timeout: number;
  headers?: Record<string, string>;
  /** Replaces the network transport (used by tests) */
  adapter?: AxiosAdapter;
}

export class HttpClientService {
  private readonly client: AxiosInstance;

  constructor(clientConfig: HttpClientConfig) {
    this.client = axios.create({
      baseURL: clientConfig.baseURL,
      timeout: clientConfig.timeout,
      responseType: "text",
      // keep XML bodies as strings
      transformResponse: [(data: unknown) => data],
      headers: {
        "Content-Type": "application/xml",
        Accept: "application/xml",
        ...clientConfig.headers,
      },
      ...(clientConfig.adapter ? { adapter: clientConfig.adapter } : {}),
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((reqConfig) => {
      const ctx = context.get();

      if (ctx?.correlationId) {
        reqConfig.headers.set("X-Correlation-ID", ctx.correlationId);
      }
      if (ctx?.transactionId) {
        reqConfig.headers.set("X-Request-ID", ctx.transactionId);
      }

      logger.debug(
        {
          type: "http_request",
          method: reqConfig.method?.toUpperCase(),
          url: reqConfig.url,
          baseURL: reqConfig.baseURL,
        },
        "HTTP request starting"
      );

      return reqConfig;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => this.handleError(error)
    );
  }

  private handleError(error: AxiosError): Promise<never> {
    // aborted by the caller: keep axios' CanceledError so callers can tell it apart
    if (axios.isCancel(error)) {
      return Promise.reject(error);
    }

    const url = error.config?.url || "unknown";

    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      logger.error(
        {
          type: "http_timeout",
          url,
          timeout: error.config?.timeout,
        },
        "HTTP request timed out"
      );
      return Promise.reject(new UpstreamTimeoutError(url, error.config?.timeout || 0));
    }

    if (!error.response) {
      logger.error(
        {
          type: "http_connection_error",
          url,
          code: error.code,
          message: error.message,
        },
        "HTTP connection error"
      );
      return Promise.reject(new UpstreamConnectionError(error.message, error));
    }

    const body = typeof error.response.data === "string" ? error.response.data : undefined;
    logger.error(
      {
        type: "http_error",
        status: error.response.status,
        url,
      },
      "HTTP request failed"
    );

    return Promise.reject(
      new UpstreamApiError(`CapCorn responded with HTTP ${error.response.status}`, {
        status: error.response.status,
        responseBody: body,
        cause: error,
      })
    );
  }

  async post(
    url: string,
    data: string,
    additionalConfig?: Partial<AxiosRequestConfig>
  ): Promise<AxiosResponse<string>> {
    return this.client.post<string>(url, data, additionalConfig);
  }
}
