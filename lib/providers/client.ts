import type { Env } from "@/lib/env";
import { ProviderHttpError, ProviderResponseError, ProviderTimeoutError } from "@/lib/errors";
import { logger } from "@/lib/observability/logger";
import type { ProviderCallOptions, ProviderClient, ProviderClientConfig, ProviderReply } from "@/lib/providers/types";

const API_PREFIX = "/v1";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nowMs() {
  return Date.now();
}

export function providerConfigFromEnv(env: Env): ProviderClientConfig {
  return {
    apiKey: env.PROVIDER_API_KEY,
    baseUrl: env.PROVIDER_API_BASE_URL,
    timeoutMs: env.PROVIDER_HTTP_TIMEOUT_MS
  };
}

export function buildProviderUrl(baseUrl: string, path: string) {
  const normalizedBase = baseUrl.trim().replace(/\/+$/, "");
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizedBase}${API_PREFIX}${normalizedPath}`;
}

async function readData(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  const text = await response.text();
  if (!contentType.includes("application/json")) {
    return text;
  }
  if (text.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // error pages often claim json; the caller reports them by status
    if (!response.ok) {
      return text;
    }
    throw new ProviderResponseError(`Provider returned malformed JSON (HTTP ${response.status})`);
  }
}

function asRecord(data: unknown): Record<string, unknown> {
  if (isRecord(data)) {
    return data;
  }
  if (typeof data === "string") {
    return data.length > 0 ? { raw: data } : {};
  }
  return { raw: data };
}

function assertOk(reply: ProviderReply) {
  if (reply.status < 200 || reply.status >= 300) {
    throw new ProviderHttpError(reply.status, reply.body);
  }
}

export function createProviderClient(config: ProviderClientConfig): ProviderClient {
  const apiKey = config.apiKey.trim();

  async function send(method: "GET" | "POST", path: string, payload: unknown, options?: ProviderCallOptions): Promise<ProviderReply> {
    const url = buildProviderUrl(config.baseUrl, path);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new ProviderTimeoutError(config.timeoutMs)), config.timeoutMs);
    const upstream = options?.signal;
    const forwardAbort = () => controller.abort(upstream?.reason);
    if (upstream?.aborted) {
      forwardAbort();
    } else {
      upstream?.addEventListener("abort", forwardAbort, { once: true });
    }

    const startedAtMs = nowMs();
    try {
      const response = await fetch(url, {
        method,
        headers: {
          accept: "application/json",
          Authorization: `Bearer ${apiKey}`,
          ...(method === "POST" ? { "content-type": "application/json" } : {})
        },
        body: method === "POST" ? JSON.stringify(payload) : undefined,
        signal: controller.signal
      });
      const data = await readData(response);
      logger.debug("Provider call finished", {
        method,
        path,
        status: response.status,
        durationMs: nowMs() - startedAtMs
      });
      return { status: response.status, body: asRecord(data), data };
    } catch (error) {
      // the body read can fail after the headers arrived; report the abort, not the stream error
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      upstream?.removeEventListener("abort", forwardAbort);
    }
  }

  return {
    async postJson(path, payload, options) {
      const reply = await send("POST", path, payload, options);
      assertOk(reply);
      return reply.body;
    },
    async postForward(path, payload, options) {
      const reply = await send("POST", path, payload, options);
      assertOk(reply);
      return reply.data;
    },
    async get(path, options) {
      return send("GET", path, undefined, options);
    }
  };
}
