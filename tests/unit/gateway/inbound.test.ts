import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import {
  InboundProcessor,
  SESSION_RESTARTED_REPLY,
  failureReply,
} from "../../../src/gateway/inbound.js";
import { AgentLoop } from "../../../src/application/agent-loop.js";
import { ChannelRegistry } from "../../../src/infrastructure/channels/registry.js";
import { MessageBus } from "../../../src/infrastructure/queue/message-bus.js";
import { createInboundMessage } from "../../../src/infrastructure/queue/events.js";
import { SessionStore } from "../../../src/infrastructure/storage/session-store.js";
import { BindingStore } from "../../../src/infrastructure/storage/binding-store.js";
import { parseConfig } from "../../../src/infrastructure/config/loader.js";
import { ToolRegistry } from "../../../src/tools/registry.js";
import { BackendError } from "../../../src/core/errors.js";
import type { IChannel } from "../../../src/core/interfaces/channel.js";
import type { Broadcast } from "../../../src/gateway/protocol.js";
import { ScriptedLLMProvider } from "../../helpers/scripted-llm-provider.js";

class RecordingChannel implements IChannel {
  readonly name = "telegram";
  readonly isRunning = true;
  sent: Array<{ conversationId: string; text: string }> = [];

  async start(): Promise<void> {}

  async stop(): Promise<void> {}

  async send(conversationId: string, text: string): Promise<void> {
    this.sent.push({ conversationId, text });
  }

  isAllowed(): boolean {
    return true;
  }
}

const message = (text: string) =>
  createInboundMessage({ channelId: "telegram", conversationId: "42", senderId: "7|alice", text });

describe("InboundProcessor", () => {
  let bus: MessageBus;
  let sessions: SessionStore;
  let bindings: BindingStore;
  let channel: RecordingChannel;
  let channels: ChannelRegistry;
  let broadcast: Mock<Broadcast>;

  beforeEach(async () => {
    bus = new MessageBus();
    sessions = new SessionStore();
    bindings = new BindingStore();
    channel = new RecordingChannel();
    channels = new ChannelRegistry();
    await channels.register(channel);
    broadcast = vi.fn<Broadcast>();
  });

  function processor(provider: ScriptedLLMProvider): InboundProcessor {
    const agent = new AgentLoop({
      sessions,
      providers: { ollama: provider },
      tools: new ToolRegistry(),
      agents: parseConfig({}).agents,
      systemContext: () => "",
    });
    return new InboundProcessor({ bus, agent, sessions, bindings, channels, broadcast, pollIntervalMs: 10 });
  }

  it("binds a new session and replies", async () => {
    const inbound = processor(ScriptedLLMProvider.fromStrings(["Hi!"]));

    await inbound.processMessage(message("hello"));

    const sessionId = bindings.getSessionId("telegram", "42");
    expect(sessionId).toMatch(/^sess-/);
    expect(channel.sent).toEqual([{ conversationId: "42", text: "Hi!" }]);
    expect(broadcast.mock.calls).toEqual([
      ["session.message", { sessionId, role: "user", content: "hello", channelId: "telegram", conversationId: "42" }],
      ["session.message", { sessionId, role: "assistant", content: "Hi!", channelId: "telegram", conversationId: "42" }],
    ]);
  });

  it("keeps using the bound session", async () => {
    const provider = ScriptedLLMProvider.fromStrings(["one", "two"]);
    const inbound = processor(provider);

    await inbound.processMessage(message("first"));
    await inbound.processMessage(message("second"));

    const sessionId = bindings.getSessionId("telegram", "42") ?? "";
    expect(sessions.get(sessionId)?.messages.map((msg) => msg.content)).toEqual(["first", "one", "second", "two"]);
  });

  it("restarts the session on /new", async () => {
    const inbound = processor(ScriptedLLMProvider.fromStrings(["one"]));
    await inbound.processMessage(message("first"));
    const previous = bindings.getSessionId("telegram", "42") ?? "";

    await inbound.processMessage(message("  /NEW "));

    const current = bindings.getSessionId("telegram", "42") ?? "";
    expect(current).not.toBe(previous);
    expect(sessions.get(previous)).toBeUndefined();
    expect(sessions.get(current)?.messages).toEqual([]);
    expect(channel.sent.at(-1)).toEqual({ conversationId: "42", text: SESSION_RESTARTED_REPLY });
  });

  it("reports failed turns to the conversation", async () => {
    const error = new BackendError("ollama request failed: connection refused");
    const inbound = processor(ScriptedLLMProvider.withError(error));

    await inbound.processMessage(message("hello"));

    expect(channel.sent).toEqual([
      {
        conversationId: "42",
        text: "something went wrong: ollama request failed: connection refused. check the gateway logs for details.",
      },
    ]);
    expect(failureReply(error)).toBe(channel.sent[0]?.text);
  });

  it("does not send empty replies", async () => {
    const inbound = processor(ScriptedLLMProvider.fromStrings([""]));

    await inbound.processMessage(message("hello"));

    expect(channel.sent).toEqual([]);
    expect(broadcast).toHaveBeenCalledTimes(1);
  });

  it("consumes the bus until it stops", async () => {
    const inbound = processor(ScriptedLLMProvider.fromStrings(["Hi!"]));
    inbound.start();

    await bus.publishInbound(message("hello"));
    await vi.waitFor(() => expect(channel.sent).toHaveLength(1));

    bus.stop();
    await inbound.stop();
    expect(channel.sent).toEqual([{ conversationId: "42", text: "Hi!" }]);
  });
});
