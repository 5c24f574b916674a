/**
 * Unit tests for the chatbot engine.
 */

import { ChatbotEngine, type ChatStreamEvent } from "../../../src/chatbot/engine";
import type { LlmConfig } from "../../../src/config";
import { ProviderError, SessionNotFound, ValidationError } from "../../../src/errors";
import { SessionRegistry } from "../../../src/memory/registry";
import { FakeLLM } from "../../helpers/fake-llm";

const NOW = Date.parse("2024-05-01T10:00:00.000Z");

const LLM: LlmConfig = {
  provider: "stub",
  temperature: 0.7,
  maxTokens: 100,
  timeoutMs: 0,
  allowStubFallback: false,
  apiKeys: { openai: "test-secret" },
};

function engine(llm: FakeLLM = new FakeLLM()): ChatbotEngine {
  let n = 0;
  const registry = new SessionRegistry({
    memory: { maxMessages: 20, summaryThreshold: 10, contextWindow: 5, factsDriftBound: 0, timeoutMs: 0 },
    providerFactory: () => llm,
    now: () => NOW,
    newId: () => `id-${++n}`,
  });
  return new ChatbotEngine(registry, LLM);
}

describe("ChatbotEngine", () => {
  it("creates sessions with the configured defaults", () => {
    expect(engine().createSession()).toEqual({
      sessionId: "id-1",
      provider: "stub",
      model: "stub-echo",
      temperature: 0.7,
      maxTokens: 100,
      createdAt: "2024-05-01T10:00:00.000Z",
    });
  });

  it("validates session options", () => {
    const e = engine();
    expect(() => e.createSession({ provider: "acme" })).toThrow(
      "Unknown provider: acme (expected one of openai, groq, gemini, anthropic, stub)"
    );
    expect(() => e.createSession({ temperature: 3 })).toThrow(ValidationError);
    expect(() => e.createSession({ maxTokens: 0 })).toThrow(ValidationError);
    expect(() => e.createSession({ systemPrompt: " " })).toThrow(ValidationError);
    expect(e.listSessions()).toEqual([]);
  });

  it("uses the provider default model when another provider is chosen", () => {
    expect(engine().createSession({ provider: "openai" }).model).toBe("gpt-4o");
  });

  it("chat without a session id starts a new session", async () => {
    const e = engine(new FakeLLM().enqueue("Hello back"));
    const result = await e.chat(undefined, "Hello");
    expect(result).toEqual({
      sessionId: "id-1",
      response: "Hello back",
      provider: "stub",
      model: "stub-echo",
      timestamp: "2024-05-01T10:00:00.000Z",
      warnings: [],
    });
    expect((await e.getHistory("id-1")).map((t) => t.content)).toEqual(["Hello", "Hello back"]);
  });

  it("reports the new session id when the first reply fails", async () => {
    const llm = new FakeLLM().enqueue(new ProviderError("network", "offline", "stub"));
    const e = engine(llm);

    await expect(e.chat(undefined, "Hello")).rejects.toMatchObject({
      kind: "network",
      context: { provider: "stub", sessionId: "id-1" },
    });
    expect((await e.getHistory("id-1")).map((t) => t.content)).toEqual(["Hello"]);
  });

  it("does not tag failures on a session the caller named", async () => {
    const llm = new FakeLLM().enqueue(new ProviderError("network", "offline", "stub"));
    const e = engine(llm);
    const { sessionId } = e.createSession();

    const failure: unknown = await e.chat(sessionId, "Hello").catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure instanceof ProviderError ? failure.context.sessionId : "not a provider error").toBeUndefined();
  });

  it("rejects an empty message before creating anything", async () => {
    const e = engine();
    await expect(e.chat(undefined, "  ")).rejects.toThrow("message must not be empty");
    expect(e.listSessions()).toEqual([]);
  });

  it("reports unknown sessions", async () => {
    const e = engine();
    await expect(e.chat("missing", "Hello")).rejects.toThrow(SessionNotFound);
    await expect(e.getStats("")).rejects.toThrow(ValidationError);
  });

  it("streams chunks and a final done event", async () => {
    const e = engine(new FakeLLM().enqueue("one two"));
    const { sessionId } = e.createSession();
    const events: ChatStreamEvent[] = [];
    for await (const event of e.chatStream(sessionId, "Hi")) events.push(event);
    expect(events).toEqual([
      { type: "chunk", sessionId, text: "one " },
      { type: "chunk", sessionId, text: "two" },
      {
        type: "done",
        sessionId,
        response: "one two",
        provider: "stub",
        model: "stub-echo",
        timestamp: "2024-05-01T10:00:00.000Z",
        warnings: [],
      },
    ]);
  });

  it("adds turns with a checked role", async () => {
    const e = engine();
    const { sessionId } = e.createSession();
    await expect(e.addTurn(sessionId, "robot", "beep")).rejects.toThrow("role must be one of system, user, assistant");
    const { turn, context } = await e.addTurn(sessionId, "user", "Hello");
    expect(turn.id).toBe(1);
    expect(context.messages[context.messages.length - 1]).toEqual({ role: "user", content: "Hello" });
  });

  it("searches with a default of five hits", async () => {
    const e = engine();
    const { sessionId } = e.createSession();
    for (let i = 1; i <= 7; i++) await e.addTurn(sessionId, "user", `apple ${i}`);
    const hits = await e.search(sessionId, "apple");
    expect(hits.map((h) => (h.kind === "turn" ? h.turn.id : 0))).toEqual([7, 6, 5, 4, 3]);
  });

  it("switches provider and falls back to that provider's default model", async () => {
    const e = engine();
    const { sessionId } = e.createSession({ temperature: 0.4 });
    expect(await e.switchProvider(sessionId, "openai")).toEqual({
      provider: "openai",
      model: "gpt-4o",
      temperature: 0.4,
      maxTokens: 100,
    });
    await expect(e.switchProvider(sessionId, "acme")).rejects.toThrow(ValidationError);
    expect((await e.getStats(sessionId)).provider).toBe("openai");
  });

  it("moves a session between engines through export and import", async () => {
    const source = engine(new FakeLLM().enqueue("Hi"));
    const { sessionId } = source.createSession();
    await source.chat(sessionId, "Hello");
    const record = await source.exportSession(sessionId);

    const target = engine();
    expect(target.importSession(record)).toBe(sessionId);
    expect(await target.exportSession(sessionId)).toEqual(record);
  });

  it("deletes sessions", async () => {
    const e = engine();
    const { sessionId } = e.createSession();
    e.deleteSession(sessionId);
    await expect(e.getStats(sessionId)).rejects.toThrow(SessionNotFound);
  });

  it("lists providers with their key status", () => {
    const listing = engine().listProviders();
    expect(listing.map((p) => [p.name, p.configured])).toEqual([
      ["openai", true],
      ["groq", false],
      ["gemini", false],
      ["anthropic", false],
      ["stub", true],
    ]);
  });
});
