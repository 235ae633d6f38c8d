import { z } from "zod";

const EnvSchema = z.object({
  PROVIDER_API_KEY: z.string().trim().min(1, "PROVIDER_API_KEY environment variable not set"),
  PROVIDER_API_BASE_URL: z.string().url().default("https://tonn.roexaudio.com"),
  PROVIDER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LOG_NAMESPACE: z.string().min(1).default("mixbridge"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return EnvSchema.parse({
    PROVIDER_API_KEY: source.PROVIDER_API_KEY,
    PROVIDER_API_BASE_URL: source.PROVIDER_API_BASE_URL || undefined,
    PROVIDER_HTTP_TIMEOUT_MS: source.PROVIDER_HTTP_TIMEOUT_MS || undefined,
    LOG_NAMESPACE: source.LOG_NAMESPACE || undefined,
    LOG_LEVEL: source.LOG_LEVEL || undefined
  });
}

export const env = parseEnv(process.env);
