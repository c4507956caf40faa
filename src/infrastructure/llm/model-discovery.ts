/**
 * Model discovery against the local model servers.
 */

import { z } from "zod";
import { BackendError } from "../../core/errors.js";

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).nullish(),
});

const OpenAIModelsSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()).nullish(),
});

const LmStudioNativeModelsSchema = z.object({
  models: z
    .array(
      z
        .object({
          key: z.string().nullish(),
          type: z.string().nullish(),
        })
        .passthrough(),
    )
    .nullish(),
});

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * LM Studio server root for the native API: the base URL without a trailing /v1.
 */
export function lmStudioServerRoot(baseUrl: string): string {
  const base = trimTrailingSlash(baseUrl);
  return base.endsWith("/v1") ? base.slice(0, -3) : base;
}

/**
 * GET a JSON document, failing with BackendError on transport or HTTP errors.
 */
export async function fetchJson(url: string, init?: RequestInit): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    throw new BackendError(`request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new BackendError(`${url} returned ${response.status} ${body}`.trim());
  }
  return response.json();
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, url: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new BackendError(`unexpected response from ${url}`);
  }
  return result.data;
}

/**
 * Models installed in Ollama (GET /api/tags).
 */
export async function listOllamaModels(baseUrl: string): Promise<string[]> {
  const url = `${trimTrailingSlash(baseUrl)}/api/tags`;
  const data = parseOrThrow(OllamaTagsSchema, await fetchJson(url), url);
  return (data.models ?? []).map((model) => model.name);
}

/**
 * Models offered by LM Studio's OpenAI-compatible API (GET <base>/models).
 */
export async function listLmStudioModels(baseUrl: string): Promise<string[]> {
  const url = `${trimTrailingSlash(baseUrl)}/models`;
  const data = parseOrThrow(OpenAIModelsSchema, await fetchJson(url), url);
  return (data.data ?? []).map((model) => model.id);
}

/**
 * LLMs known to LM Studio's native API (GET <root>/api/v1/models).
 */
export async function listLmStudioNativeModels(baseUrl: string): Promise<string[]> {
  const url = `${lmStudioServerRoot(baseUrl)}/api/v1/models`;
  const data = parseOrThrow(LmStudioNativeModelsSchema, await fetchJson(url), url);
  return (data.models ?? []).filter((model) => model.type === "llm").map((model) => model.key ?? "");
}
