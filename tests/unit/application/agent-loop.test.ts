import { describe, it, expect, beforeEach } from "vitest";
import { AgentLoop, MAX_TOOL_ITERATIONS } from "../../../src/application/agent-loop.js";
import { SessionStore } from "../../../src/infrastructure/storage/session-store.js";
import { parseConfig } from "../../../src/infrastructure/config/loader.js";
import { ToolRegistry } from "../../../src/tools/registry.js";
import { Tool } from "../../../src/tools/base.js";
import type { ToolParametersSchema, ToolCallRequest } from "../../../src/core/types/tool.js";
import type { ILLMProvider } from "../../../src/core/interfaces/llm-provider.js";
import type { BackendId } from "../../../src/core/types/llm.js";
import { BackendError } from "../../../src/core/errors.js";
import { ScriptedLLMProvider } from "../../helpers/scripted-llm-provider.js";

class EchoTool extends Tool {
  readonly name = "echo";
  readonly description = "Echo text";
  readonly parameters: ToolParametersSchema = { type: "object", properties: { text: { type: "string" } } };
  calls = 0;

  async execute(params: Record<string, unknown>): Promise<string> {
    this.calls++;
    return `echo: ${String(params.text)}`;
  }
}

const echoCall = (id: string, text = "hi"): ToolCallRequest => ({ id, name: "echo", arguments: { text } });

describe("AgentLoop", () => {
  let sessions: SessionStore;
  let tools: ToolRegistry;
  let echo: EchoTool;

  beforeEach(() => {
    sessions = new SessionStore();
    tools = new ToolRegistry();
    echo = new EchoTool();
  });

  function loop(provider: ScriptedLLMProvider, config: unknown = {}): AgentLoop {
    const providers: Partial<Record<BackendId, ILLMProvider>> = {};
    providers[provider.backend] = provider;
    return new AgentLoop({
      sessions,
      providers,
      tools,
      agents: parseConfig(config).agents,
      systemContext: () => "Today's date: 2026-02-25\n\n",
    });
  }

  it("answers a plain message", async () => {
    const provider = ScriptedLLMProvider.fromStrings(["Hello!"]);

    const result = await loop(provider).handle({ message: "hi" });

    expect(result.content).toBe("Hello!");
    expect(result.toolCalls).toEqual([]);
    expect(result.sessionId).toMatch(/^sess-/);
    expect(sessions.get(result.sessionId)?.messages.map((msg) => [msg.role, msg.content])).toEqual([
      ["user", "hi"],
      ["assistant", "Hello!"],
    ]);

    const [call] = provider.capturedCalls;
    expect(call?.model).toBe("llama3.2:latest");
    expect(call?.tools).toBeUndefined();
    expect(call?.messages).toEqual([
      { role: "system", content: "Today's date: 2026-02-25\n\n" },
      { role: "user", content: "hi" },
    ]);
  });

  it("keeps history across turns of a session", async () => {
    const provider = ScriptedLLMProvider.fromStrings(["one", "two"]);
    const agent = loop(provider);

    await agent.handle({ sessionId: "chat-1", message: "first" });
    const result = await agent.handle({ sessionId: "chat-1", message: "second" });

    expect(result.sessionId).toBe("chat-1");
    expect(provider.capturedCalls[1]?.messages.slice(1)).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: "one" },
      { role: "user", content: "second" },
    ]);
  });

  it("executes tool calls and feeds results back", async () => {
    tools.register(echo);
    const provider = ScriptedLLMProvider.withToolCalls([echoCall("c1", "ping")], "done");

    const result = await loop(provider).handle({ message: "use the tool" });

    expect(result.content).toBe("done");
    expect(echo.calls).toBe(1);
    expect(Object.keys(provider.capturedCalls[0]?.tools ?? {})).toEqual(["echo"]);

    const history = sessions.get(result.sessionId)?.messages ?? [];
    expect(history.map((msg) => msg.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(history[2]).toMatchObject({ content: "echo: ping", toolCallId: "c1", toolName: "echo" });

    expect(provider.capturedCalls[1]?.messages.at(-1)).toEqual({
      role: "tool",
      content: [{ type: "tool-result", toolCallId: "c1", toolName: "echo", result: "echo: ping" }],
    });
  });

  it("stops after the maximum number of tool iterations", async () => {
    tools.register(echo);
    const responses = Array.from({ length: MAX_TOOL_ITERATIONS + 2 }, (_, i) => ({
      content: null,
      toolCalls: [echoCall(`c${i}`)],
    }));
    const provider = new ScriptedLLMProvider(responses);

    const result = await loop(provider).handle({ message: "loop forever" });

    expect(provider.callCount).toBe(MAX_TOOL_ITERATIONS);
    expect(echo.calls).toBe(MAX_TOOL_ITERATIONS - 1);
    expect(result.content).toBe("");
    expect(result.toolCalls).toEqual([echoCall(`c${MAX_TOOL_ITERATIONS - 1}`)]);
    expect(sessions.get(result.sessionId)?.messages).toHaveLength(2 * MAX_TOOL_ITERATIONS);
  });

  it("ends the turn when tool calls arrive but no tools are registered", async () => {
    const provider = ScriptedLLMProvider.withToolCalls([echoCall("c1")], "unused");

    const result = await loop(provider).handle({ message: "hi" });

    expect(provider.callCount).toBe(1);
    expect(result.toolCalls).toEqual([echoCall("c1")]);
  });

  it("feeds tool errors back to the model", async () => {
    tools.register(echo);
    const provider = ScriptedLLMProvider.withToolCalls([{ id: "c1", name: "missing_tool", arguments: {} }], "sorry");

    const result = await loop(provider).handle({ message: "hi" });

    expect(result.content).toBe("sorry");
    const history = sessions.get(result.sessionId)?.messages ?? [];
    expect(history[2]?.content).toBe("error: unknown tool: missing_tool");
  });

  it("fails when the backend has no provider", async () => {
    const provider = new ScriptedLLMProvider([], "lmstudio");
    await expect(loop(provider).handle({ message: "hi" })).rejects.toThrow(
      new BackendError("backend not available: ollama"),
    );
  });

  it("propagates backend errors", async () => {
    const provider = ScriptedLLMProvider.withError(new BackendError("ollama request failed: connection refused"));
    await expect(loop(provider).handle({ message: "hi" })).rejects.toBeInstanceOf(BackendError);
  });

  it("honors backend and model overrides", async () => {
    const provider = ScriptedLLMProvider.fromStrings(["a", "b"]);
    const lmstudio = new ScriptedLLMProvider([{ content: "from lmstudio" }], "lmstudio");
    const agent = new AgentLoop({
      sessions,
      providers: { ollama: provider, lmstudio },
      tools,
      agents: parseConfig({ agents: { defaultModel: "qwen3:8b" } }).agents,
      systemContext: () => "",
    });

    const result = await agent.handle({ message: "hi", backend: "LM_Studio", model: "mistral" });
    await agent.handle({ message: "hi", backend: "unknown" });

    expect(result.content).toBe("from lmstudio");
    expect(lmstudio.capturedCalls[0]?.model).toBe("mistral");
    expect(lmstudio.capturedCalls[0]?.messages).toEqual([{ role: "user", content: "hi" }]);
    expect(provider.capturedCalls[0]?.model).toBe("qwen3:8b");
  });

  it("falls back to the backend's model for a blank model", () => {
    const agent = loop(ScriptedLLMProvider.fromStrings([]), { agents: { defaultBackend: "lmstudio" } });
    expect(agent.resolveBackend(undefined)).toBe("lmstudio");
    expect(agent.resolveModel("lmstudio", "  ")).toBe("gpt-oss-20b");
    expect(agent.resolveModel("ollama", undefined)).toBe("llama3.2:latest");
  });
});
