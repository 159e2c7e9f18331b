import {
  GatewayRequestFailedError,
  GatewayRequestTimeoutError,
  GatewayUnreachableError,
  ProviderNotFoundError,
} from "@armada/errors";
import type { GatewayCredentials } from "@armada/vault";
import type { z } from "zod";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface GatewayHttpClientConfig {
  /** Gateway control API root; a trailing slash is ignored */
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Sent as HTTP Basic auth when present */
  readonly credentials?: GatewayCredentials | undefined;
}

export interface GatewayRequestOptions {
  readonly method: HttpMethod;
  /** Operation name used in failure messages, e.g. "create provider" */
  readonly operation: string;
  /** Statuses treated as success */
  readonly expect: readonly number[];
  readonly body?: unknown;
  /** Provider id to report when the gateway answers 404 */
  readonly notFound?: string;
}

/**
 * Minimal client for one gateway's control API.
 *
 * Built per call, so concurrent operations against different gateways
 * never share a base URL or credentials. No retries: callers decide.
 */
export class GatewayHttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(config: GatewayHttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
    this.headers = {
      Accept: "application/json",
      ...(config.credentials ? { Authorization: basicAuth(config.credentials) } : {}),
    };
  }

  /**
   * Send a request and enforce the expected statuses.
   */
  async send(path: string, options: GatewayRequestOptions): Promise<Response> {
    const url = this.buildUrl(path);
    const init: RequestInit = { method: options.method, headers: this.headers };
    if (options.body !== undefined) {
      init.headers = { ...this.headers, "Content-Type": "application/json" };
      init.body = JSON.stringify(options.body);
    }

    const response = await this.fetchWithTimeout(url, init);

    if (response.status === 404 && options.notFound !== undefined) {
      throw new ProviderNotFoundError(options.notFound);
    }
    if (!options.expect.includes(response.status)) {
      throw new GatewayRequestFailedError(
        `${options.operation} failed with status ${response.status}`,
        response.status,
      );
    }
    return response;
  }

  /**
   * Send a request and validate the JSON body against `schema`.
   */
  async request<S extends z.ZodTypeAny>(
    path: string,
    options: GatewayRequestOptions,
    schema: S,
  ): Promise<z.infer<S>> {
    const response = await this.send(path, options);

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GatewayRequestFailedError(
        "failed to decode response",
        response.status,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new GatewayRequestFailedError("failed to decode response", response.status, parsed.error);
    }
    return parsed.data;
  }

  buildUrl(path: string): string {
    return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new GatewayRequestTimeoutError(url, this.timeoutMs);
      }
      throw new GatewayUnreachableError(url, error instanceof Error ? error : undefined);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function basicAuth(credentials: GatewayCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString(
    "base64",
  );
  return `Basic ${encoded}`;
}
