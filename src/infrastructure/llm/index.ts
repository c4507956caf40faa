/**
 * LLM infrastructure: provider construction and model discovery.
 */

import type { ILLMProvider } from "../../core/interfaces/llm-provider.js";
import type { BackendId } from "../../core/types/llm.js";
import {
  backendDiscoveryEnabled,
  defaultModelFor,
  resolveLmStudioBaseUrl,
  resolveOllamaBaseUrl,
  type AgentsConfig,
} from "../config/schema.js";
import { AIProvider } from "./ai-sdk-provider.js";
import { LmStudioNativeProvider } from "./lmstudio-native-provider.js";
import { listLmStudioModels, listOllamaModels, trimTrailingSlash } from "./model-discovery.js";
import { errorMessage } from "../../core/errors.js";
import logger from "../../utils/logger.js";

export { AIProvider, type AIProviderOptions } from "./ai-sdk-provider.js";
export { LmStudioNativeProvider, toNativeInput } from "./lmstudio-native-provider.js";
export {
  listOllamaModels,
  listLmStudioModels,
  listLmStudioNativeModels,
  lmStudioServerRoot,
  fetchJson,
} from "./model-discovery.js";
export { messageText } from "./messages.js";

/**
 * One provider per backend, keyed by backend id.
 */
export type ProviderSet = Record<BackendId, ILLMProvider>;

/**
 * Build the provider for a backend from the agents config.
 */
export function createProvider(backend: BackendId, agents: AgentsConfig): ILLMProvider {
  if (backend === "lmstudio") {
    const baseUrl = trimTrailingSlash(resolveLmStudioBaseUrl(agents));
    const defaultModel = defaultModelFor("lmstudio");
    if (agents.backends.lmStudio.endpointType === "native") {
      return new LmStudioNativeProvider({ baseUrl, defaultModel });
    }
    return new AIProvider({
      backend,
      baseURL: baseUrl,
      defaultModel,
      listModels: () => listLmStudioModels(baseUrl),
    });
  }

  const baseUrl = trimTrailingSlash(resolveOllamaBaseUrl(agents));
  return new AIProvider({
    backend,
    baseURL: `${baseUrl}/v1`,
    defaultModel: defaultModelFor("ollama"),
    listModels: () => listOllamaModels(baseUrl),
  });
}

export function createProviders(agents: AgentsConfig): ProviderSet {
  return {
    ollama: createProvider("ollama", agents),
    lmstudio: createProvider("lmstudio", agents),
  };
}

/**
 * Models discovered per backend. Backends not enabled for discovery, or
 * unreachable, have an empty list.
 */
export interface DiscoveredModels {
  ollama: string[];
  lmstudio: string[];
}

export async function discoverModels(providers: ProviderSet, agents: AgentsConfig): Promise<DiscoveredModels> {
  const discover = async (backend: BackendId): Promise<string[]> => {
    if (!backendDiscoveryEnabled(agents, backend)) {
      return [];
    }
    try {
      const models = await providers[backend].listModels();
      logger.info({ backend, count: models.length }, "Discovered models");
      return models;
    } catch (error) {
      logger.debug({ backend, error: errorMessage(error) }, "Model discovery failed");
      return [];
    }
  };

  const [ollama, lmstudio] = await Promise.all([discover("ollama"), discover("lmstudio")]);
  return { ollama, lmstudio };
}
