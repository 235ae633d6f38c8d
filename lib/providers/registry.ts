import { env } from "../env";
import { createProviderClient, providerConfigFromEnv } from "./client";
import { createAudioServiceRouter } from "./router";

export const providerClient = createProviderClient(providerConfigFromEnv(env));

export const audioServiceRouter = createAudioServiceRouter({ client: providerClient });
