import { describe, it, expect } from "vitest";
import {
  backendDiscoveryEnabled,
  defaultModelFor,
  isLoopbackBind,
  normalizeBackend,
  parseBackend,
  resolveEffectiveBackendAndModel,
  resolveLmStudioBaseUrl,
  resolveOllamaBaseUrl,
} from "../../../src/infrastructure/config/schema.js";
import { parseConfig } from "../../../src/infrastructure/config/loader.js";

describe("parseConfig defaults", () => {
  it("fills every section from an empty object", () => {
    const config = parseConfig({});

    expect(config.gateway).toEqual({ port: 15151, bind: "127.0.0.1", auth: { mode: "none" } });
    expect(config.channels.telegram.allowFrom).toEqual([]);
    expect(config.agents.backends.lmStudio.endpointType).toBe("openai");
    expect(config.skills).toEqual({
      extraDirs: [],
      enabled: [],
      contextMode: "full",
      allowScripts: false,
    });
  });

  it("keeps configured values", () => {
    const config = parseConfig({
      gateway: { port: 9000, auth: { mode: "token", token: "test-secret" } },
      skills: { contextMode: "readOnDemand", enabled: ["notes"] },
    });

    expect(config.gateway.port).toBe(9000);
    expect(config.gateway.bind).toBe("127.0.0.1");
    expect(config.gateway.auth).toEqual({ mode: "token", token: "test-secret" });
    expect(config.skills.contextMode).toBe("readOnDemand");
    expect(config.skills.enabled).toEqual(["notes"]);
  });
});

describe("backend helpers", () => {
  it("normalizes backend names", () => {
    expect(normalizeBackend(undefined)).toBe("ollama");
    expect(normalizeBackend(" LM_Studio ")).toBe("lmstudio");
    expect(normalizeBackend("lmstudio")).toBe("lmstudio");
    expect(normalizeBackend("something-else")).toBe("ollama");
  });

  it("parses only known backends", () => {
    expect(parseBackend("Ollama")).toBe("ollama");
    expect(parseBackend("lm_studio")).toBe("lmstudio");
    expect(parseBackend("vllm")).toBeUndefined();
    expect(parseBackend(undefined)).toBeUndefined();
  });

  it("falls back to the backend's default model", () => {
    expect(defaultModelFor("ollama")).toBe("llama3.2:latest");
    expect(defaultModelFor("lmstudio")).toBe("gpt-oss-20b");

    const agents = parseConfig({ agents: { defaultBackend: "lmstudio", defaultModel: "  " } }).agents;
    expect(resolveEffectiveBackendAndModel(agents)).toEqual({ backend: "lmstudio", model: "gpt-oss-20b" });
  });

  it("uses the configured default model", () => {
    const agents = parseConfig({ agents: { defaultModel: "qwen3:8b" } }).agents;
    expect(resolveEffectiveBackendAndModel(agents)).toEqual({ backend: "ollama", model: "qwen3:8b" });
  });

  it("discovers only the default backend without enabledBackends", () => {
    const agents = parseConfig({ agents: { defaultBackend: "lmstudio" } }).agents;
    expect(backendDiscoveryEnabled(agents, "lmstudio")).toBe(true);
    expect(backendDiscoveryEnabled(agents, "ollama")).toBe(false);
  });

  it("discovers the listed backends, case-insensitively", () => {
    const agents = parseConfig({ agents: { enabledBackends: ["OLLAMA", "lm_studio"] } }).agents;
    expect(backendDiscoveryEnabled(agents, "ollama")).toBe(true);
    expect(backendDiscoveryEnabled(agents, "lmstudio")).toBe(true);
  });

  it("resolves base urls", () => {
    const defaults = parseConfig({}).agents;
    expect(resolveOllamaBaseUrl(defaults)).toBe("http://127.0.0.1:11434");
    expect(resolveLmStudioBaseUrl(defaults)).toBe("http://127.0.0.1:1234/v1");

    const custom = parseConfig({
      agents: { backends: { ollama: { baseUrl: "http://10.0.0.2:11434" }, lmStudio: { baseUrl: "http://10.0.0.3:1234/v1" } } },
    }).agents;
    expect(resolveOllamaBaseUrl(custom)).toBe("http://10.0.0.2:11434");
    expect(resolveLmStudioBaseUrl(custom)).toBe("http://10.0.0.3:1234/v1");
  });
});

describe("isLoopbackBind", () => {
  it("accepts loopback addresses", () => {
    expect(isLoopbackBind("127.0.0.1")).toBe(true);
    expect(isLoopbackBind("::1")).toBe(true);
    expect(isLoopbackBind("localhost")).toBe(true);
  });

  it("rejects other addresses", () => {
    expect(isLoopbackBind("0.0.0.0")).toBe(false);
    expect(isLoopbackBind("192.168.1.10")).toBe(false);
  });
});
