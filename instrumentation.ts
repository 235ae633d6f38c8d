export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  // throws when PROVIDER_API_KEY is missing
  const { env } = await import("@/lib/env");
  const { logger } = await import("@/lib/observability/logger");
  logger.info("Provider configuration loaded", {
    baseUrl: env.PROVIDER_API_BASE_URL,
    timeoutMs: env.PROVIDER_HTTP_TIMEOUT_MS
  });
}
