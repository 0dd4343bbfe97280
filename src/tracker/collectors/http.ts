import axios, { type AxiosInstance } from "axios";
import type { ZodType, ZodTypeDef } from "zod";

import { CollectorError } from "../errors.js";
import type { Platform } from "../types.js";

export interface GetJsonOptions {
  params?: Record<string, string | number>;
  signal?: AbortSignal;
}

/** Minimal JSON GET seam so collectors can be exercised without a network. */
export interface JsonClient {
  getJson(url: string, options?: GetJsonOptions): Promise<unknown>;
}

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function createHttpClient({ baseURL, timeoutMs, headers = {} }: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      Accept: "application/json",
      "User-Agent": "mention-tracker/1.0",
      ...headers,
    },
  });
}

/** Maps an HTTP failure onto the collector error kinds. */
export function toCollectorError(platform: Platform, error: unknown): CollectorError {
  if (error instanceof CollectorError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      return new CollectorError("rate_limited", `${platform} rate limited the request`, { cause: error });
    }
    if (status === 401 || status === 403) {
      return new CollectorError("auth_invalid", `${platform} rejected the credentials (HTTP ${status})`, { cause: error });
    }
    const detail = status === undefined ? error.code ?? error.message : `HTTP ${status}`;
    return new CollectorError("network_error", `${platform} request failed: ${detail}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CollectorError("network_error", `${platform} request failed: ${message}`, { cause: error });
}

export class AxiosJsonClient implements JsonClient {
  constructor(
    private readonly platform: Platform,
    private readonly http: AxiosInstance,
  ) {}

  async getJson(url: string, options: GetJsonOptions = {}): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params: options.params, signal: options.signal });
      return response.data;
    } catch (error) {
      throw toCollectorError(this.platform, error);
    }
  }
}

/** Validates a response body; a payload of the wrong shape counts as a network error. */
export function parseResponse<T>(platform: Platform, schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "root"}: ${issue.message}` : "unknown shape";
    throw new CollectorError("network_error", `${platform} returned an unexpected payload (${where})`);
  }
  return parsed.data;
}
