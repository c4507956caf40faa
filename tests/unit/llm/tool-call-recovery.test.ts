import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { AgentLoop } from "../../../src/application/agent-loop.js";
import { createProvider } from "../../../src/infrastructure/llm/index.js";
import { SessionStore } from "../../../src/infrastructure/storage/session-store.js";
import { parseConfig } from "../../../src/infrastructure/config/loader.js";
import { ToolRegistry } from "../../../src/tools/registry.js";
import { Tool } from "../../../src/tools/base.js";
import type { ToolParametersSchema } from "../../../src/core/types/tool.js";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

class EchoTool extends Tool {
  readonly name = "echo";
  readonly description = "Echo text";
  readonly parameters: ToolParametersSchema = {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
  };
  calls = 0;

  async execute(params: Record<string, unknown>): Promise<string> {
    this.calls++;
    return `echo: ${String(params.text)}`;
  }
}

function completion(message: Record<string, unknown>, finishReason: string): Response {
  const body = {
    id: "chatcmpl-1",
    object: "chat.completion",
    created: 1767225600,
    model: "llama3.2:latest",
    choices: [{ index: 0, message: { role: "assistant", content: null, ...message }, finish_reason: finishReason }],
    usage: { prompt_tokens: 12, completion_tokens: 5, total_tokens: 17 },
  };
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" } });
}

function toolCallResponse(name: string, args: string): Response {
  return completion(
    { tool_calls: [{ id: "call_1", type: "function", function: { name, arguments: args } }] },
    "tool_calls",
  );
}

describe("AIProvider tool calls the SDK cannot parse", () => {
  let fetchMock: Mock<FetchFn>;
  let sessions: SessionStore;
  let echo: EchoTool;
  let agent: AgentLoop;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal("fetch", fetchMock);

    sessions = new SessionStore();
    echo = new EchoTool();
    const tools = new ToolRegistry();
    tools.register(echo);
    const agents = parseConfig({}).agents;
    agent = new AgentLoop({
      sessions,
      providers: { ollama: createProvider("ollama", agents) },
      tools,
      agents,
      systemContext: () => "",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function secondRequest(): unknown {
    return JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body));
  }

  it("feeds an unknown tool name back to the model", async () => {
    fetchMock
      .mockResolvedValueOnce(toolCallResponse("nonexistent_tool", "{}"))
      .mockResolvedValueOnce(completion({ content: "done" }, "stop"));

    const result = await agent.handle({ message: "use a tool" });

    expect(result.content).toBe("done");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(echo.calls).toBe(0);

    const history = sessions.get(result.sessionId)?.messages ?? [];
    expect(history.map((msg) => msg.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(history[1]?.toolCalls).toEqual([
      { id: expect.stringMatching(/^call_/), name: "nonexistent_tool", arguments: {} },
    ]);
    expect(history[2]).toMatchObject({ content: "error: unknown tool: nonexistent_tool", toolName: "nonexistent_tool" });

    expect(secondRequest()).toMatchObject({
      messages: expect.arrayContaining([
        expect.objectContaining({ role: "tool", content: expect.stringContaining("error: unknown tool: nonexistent_tool") }),
      ]),
    });
  });

  it("feeds malformed arguments back to the model", async () => {
    fetchMock
      .mockResolvedValueOnce(toolCallResponse("echo", '{"text":'))
      .mockResolvedValueOnce(completion({ content: "done" }, "stop"));

    const result = await agent.handle({ message: "echo something" });

    expect(result.content).toBe("done");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(echo.calls).toBe(0);

    const history = sessions.get(result.sessionId)?.messages ?? [];
    expect(history[1]?.toolCalls).toEqual([{ id: expect.stringMatching(/^call_/), name: "echo", arguments: '{"text":' }]);
    expect(history[2]).toMatchObject({ content: "error: arguments must be an object", toolName: "echo" });

    expect(secondRequest()).toMatchObject({
      messages: expect.arrayContaining([
        expect.objectContaining({ role: "tool", content: expect.stringContaining("error: arguments must be an object") }),
      ]),
    });
  });
});
