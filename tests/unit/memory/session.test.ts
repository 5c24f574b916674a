/**
 * Unit tests for session memory.
 */

import type { LLMProvider, ProviderIdentity } from "../../../src/adapters/llm/types";
import { CapacityViolation, InternalStateError, ProviderError, SessionNotFound, ValidationError } from "../../../src/errors";
import { SessionMemory, type SessionMemoryConfig } from "../../../src/memory/session";
import { DEFAULT_SYSTEM_PROMPT } from "../../../src/prompts/memory-prompts";
import { FakeLLM, isSummarizationCall } from "../../helpers/fake-llm";

const IDENTITY: ProviderIdentity = { provider: "stub", model: "stub-echo", temperature: 0.7, maxTokens: 100 };

const CONFIG: SessionMemoryConfig = {
  maxMessages: 50,
  summaryThreshold: 20,
  contextWindow: 10,
  factsDriftBound: 0,
  timeoutMs: 0,
};

function clock(start = 1_000): () => number {
  let t = start;
  return () => t++;
}

function makeSession(llm: FakeLLM, overrides: Partial<SessionMemoryConfig> = {}): SessionMemory {
  return new SessionMemory("s-1", IDENTITY, { ...CONFIG, ...overrides }, { providerFactory: () => llm, now: clock() });
}

async function addTurns(session: SessionMemory, from: number, to: number): Promise<string[]> {
  const warnings: string[] = [];
  for (let i = from; i <= to; i++) {
    const result = await session.addTurn(i % 2 === 1 ? "user" : "assistant", `message ${i}`);
    warnings.push(...result.warnings);
  }
  return warnings;
}

describe("SessionMemory", () => {
  describe("addTurn", () => {
    it("assigns contiguous ids starting at 1", async () => {
      const session = makeSession(new FakeLLM());
      const a = await session.addTurn("user", "Hello");
      const b = await session.addTurn("assistant", "Hi there");
      expect(a.turn.id).toBe(1);
      expect(b.turn.id).toBe(2);
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello", "Hi there"]);
    });

    it("rejects empty content and unknown roles", async () => {
      const session = makeSession(new FakeLLM());
      await expect(session.addTurn("user", "   ")).rejects.toThrow(ValidationError);
      await expect(session.addTurn("user", "")).rejects.toThrow("message content must not be empty");
      expect((await session.stats()).totalTurns).toBe(0);
    });

    it("summarizes turns 1-20 once the threshold is reached and keeps 21-25", async () => {
      const llm = new FakeLLM().enqueue("Summary A");
      const session = makeSession(llm);

      const warnings = await addTurns(session, 1, 25);

      expect(warnings).toEqual([]);
      const exported = await session.export();
      expect(exported.summaries).toHaveLength(1);
      expect(exported.summaries[0].covers).toEqual([1, 20]);
      expect(exported.summaries[0].text).toBe("Summary A");
      expect(exported.turns.map((t) => t.id)).toEqual([21, 22, 23, 24, 25]);

      const stats = await session.stats();
      expect(stats.totalTurns).toBe(25);
      expect(stats.retainedTurns).toBe(5);
      expect(stats.summaries).toBe(1);
      expect(stats.utilization).toBe("10.0%");
      expect(stats.summarizerState).toBe("accumulating");
    });

    it("returns the context for the next call", async () => {
      const llm = new FakeLLM().enqueue("Summary A");
      const session = makeSession(llm);
      await addTurns(session, 1, 24);
      const { context } = await session.addTurn("user", "message 25");
      expect(context.messages[0]).toEqual({ role: "system", content: DEFAULT_SYSTEM_PROMPT });
      expect(context.messages[1]).toEqual({ role: "system", content: "Summary of turns 1-20:\nSummary A" });
      expect(context.messages.slice(2).map((m) => m.content)).toEqual([
        "message 21",
        "message 22",
        "message 23",
        "message 24",
        "message 25",
      ]);
    });

    it("keeps all turns when summarization fails and retries on the next turn", async () => {
      const llm = new FakeLLM().enqueue(new ProviderError("rate_limit", "slow down", "stub", 429), "Summary B");
      const session = makeSession(llm);

      const warnings = await addTurns(session, 1, 20);
      expect(warnings).toEqual(["Summarization deferred: slow down"]);
      expect((await session.history()).map((t) => t.id)).toHaveLength(20);

      await session.addTurn("user", "message 21");
      const exported = await session.export();
      expect(exported.summaries.map((s) => s.covers)).toEqual([[1, 20]]);
      expect(exported.summaries[0].text).toBe("Summary B");
      expect(exported.turns.map((t) => t.id)).toEqual([21]);
    });

    it("rejects a turn on a full store when catch-up summarization fails, then recovers", async () => {
      let healthy = false;
      const llm = new FakeLLM({
        fallback: () => {
          if (!healthy) throw new ProviderError("network", "offline", "stub");
          return "caught up";
        },
      });
      const session = makeSession(llm, { maxMessages: 3, summaryThreshold: 2 });
      await addTurns(session, 1, 3);

      await expect(session.addTurn("user", "message 4")).rejects.toThrow(CapacityViolation);
      expect((await session.history()).map((t) => t.id)).toEqual([1, 2, 3]);

      healthy = true;
      const result = await session.addTurn("user", "message 4");
      expect(result.turn.id).toBe(4);
      expect(result.summarized.map((s) => s.covers)).toEqual([
        [1, 2],
        [3, 4],
      ]);
      expect(await session.history()).toEqual([]);
    });

    it("runs at most one summarization at a time under concurrent appends", async () => {
      const llm = new FakeLLM();
      const session = makeSession(llm, { maxMessages: 4, summaryThreshold: 2 });

      await Promise.all([1, 2, 3, 4, 5].map((i) => session.addTurn("user", `m${i}`)));

      expect(llm.maxActive).toBe(1);
      const exported = await session.export();
      expect(exported.summaries.map((s) => s.covers)).toEqual([
        [1, 2],
        [3, 4],
      ]);
      expect(exported.turns.map((t) => [t.id, t.content])).toEqual([[5, "m5"]]);
      expect(llm.calls.filter(isSummarizationCall)[0].messages[1].content).toContain("USER: m1\nUSER: m2");
    });

    it("updates lastActiveAt to the committed turn time", async () => {
      const session = makeSession(new FakeLLM());
      const { turn } = await session.addTurn("user", "Hello");
      expect(session.lastActiveAt).toBe(turn.createdAt);
      await session.search("hello", 1);
      expect(session.lastActiveAt).toBe(turn.createdAt);
    });
  });

  describe("getContext", () => {
    it("appends a pending turn without committing it", async () => {
      const session = makeSession(new FakeLLM(), { systemPrompt: "SYS" });
      await session.addTurn("user", "Hello");
      const ctx = await session.getContext({ role: "user", content: "Next?" });
      expect(ctx.messages.map((m) => m.content)).toEqual(["SYS", "Hello", "Next?"]);
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello"]);
    });

    it("rejects a negative budget", async () => {
      const session = makeSession(new FakeLLM());
      await expect(session.getContext(undefined, { budget: -1 })).rejects.toThrow(ValidationError);
    });
  });

  describe("getSummaryText", () => {
    it("reports an empty session without calling the provider", async () => {
      const llm = new FakeLLM();
      const session = makeSession(llm);
      expect(await session.getSummaryText()).toEqual({ summary: "No conversation history available.", degraded: false });
      expect(llm.calls).toHaveLength(0);
    });

    it("asks the provider for an overview", async () => {
      const llm = new FakeLLM().enqueue("Overview");
      const session = makeSession(llm);
      await session.addTurn("user", "hello");
      expect(await session.getSummaryText()).toEqual({ summary: "Overview", degraded: false });
      expect(llm.calls[0].params).toEqual({ model: "stub-echo", temperature: 0.3, maxTokens: 800 });
    });

    it("falls back to stored summaries when the provider fails", async () => {
      const llm = new FakeLLM().enqueue("S1", "S2", new ProviderError("upstream", "bad gateway", "stub", 502));
      const session = makeSession(llm, { maxMessages: 4, summaryThreshold: 2 });
      await addTurns(session, 1, 4);
      expect(await session.getSummaryText()).toEqual({ summary: "S1\n\nS2", degraded: true });
    });

    it("falls back to the recent turns when there are no summaries", async () => {
      const llm = new FakeLLM().enqueue(new ProviderError("upstream", "bad gateway", "stub", 502));
      const session = makeSession(llm);
      await session.addTurn("user", "hello");
      await session.addTurn("assistant", "hi");
      expect(await session.getSummaryText()).toEqual({ summary: "USER: hello\nASSISTANT: hi", degraded: true });
    });
  });

  describe("getFacts", () => {
    it("caches facts until a new turn arrives", async () => {
      const llm = new FakeLLM().enqueue("- Name is Ana", "- Name is Ana\n- Lives in Oslo");
      const session = makeSession(llm);
      await session.addTurn("user", "I am Ana");

      expect(await session.getFacts()).toEqual({ facts: ["Name is Ana"], stale: false, cached: false });
      expect(await session.getFacts()).toEqual({ facts: ["Name is Ana"], stale: false, cached: true });
      expect(llm.calls).toHaveLength(1);

      await session.addTurn("user", "I live in Oslo");
      expect(await session.getFacts()).toEqual({ facts: ["Name is Ana", "Lives in Oslo"], stale: false, cached: false });
    });

    it("keeps the previous facts when extraction fails", async () => {
      const llm = new FakeLLM().enqueue("- Name is Ana", new ProviderError("timeout", "too slow", "stub"));
      const session = makeSession(llm);
      await session.addTurn("user", "I am Ana");
      await session.getFacts();
      await session.addTurn("user", "More");
      expect(await session.getFacts()).toEqual({ facts: ["Name is Ana"], stale: true, cached: false });
    });
  });

  describe("search", () => {
    it("finds turns and validates its arguments", async () => {
      const session = makeSession(new FakeLLM());
      await session.addTurn("user", "We talked about hiking");
      await session.addTurn("assistant", "And about the weather");

      const hits = await session.search("hiking", 5);
      expect(hits).toHaveLength(1);
      expect(hits[0].kind === "turn" && hits[0].turn.id).toBe(1);

      expect(await session.search("hiking", 0)).toEqual([]);
      await expect(session.search("hiking", -1)).rejects.toThrow(ValidationError);
      await expect(session.search("hiking", 1.5)).rejects.toThrow(ValidationError);
      await expect(session.search("  ", 3)).rejects.toThrow("query must not be empty");
    });
  });

  describe("generateReply", () => {
    it("commits the user turn and the reply", async () => {
      const llm = new FakeLLM().enqueue("Hi there");
      const session = makeSession(llm, { systemPrompt: "SYS" });

      const result = await session.generateReply("Hello", { temperature: 0.1 });

      expect(result.userTurn.id).toBe(1);
      expect(result.reply).toMatchObject({ id: 2, role: "assistant", content: "Hi there" });
      expect(llm.calls[0].messages).toEqual([
        { role: "system", content: "SYS" },
        { role: "user", content: "Hello" },
      ]);
      expect(llm.calls[0].params).toEqual({ model: "stub-echo", temperature: 0.1, maxTokens: 100 });
    });

    it("keeps the user turn when the reply fails", async () => {
      const llm = new FakeLLM().enqueue(new ProviderError("auth", "bad key", "stub", 401));
      const session = makeSession(llm);
      await expect(session.generateReply("Hello")).rejects.toMatchObject({ kind: "auth" });
      expect((await session.history()).map((t) => [t.role, t.content])).toEqual([["user", "Hello"]]);
    });

    it("rejects an empty reply", async () => {
      const llm = new FakeLLM().enqueue("  ");
      const session = makeSession(llm);
      await expect(session.generateReply("Hello")).rejects.toThrow("Provider returned an empty reply");
    });

    it("times out a stalled provider", async () => {
      const llm = new FakeLLM();
      llm.hold();
      const session = makeSession(llm, { timeoutMs: 20 });
      await expect(session.generateReply("Hello")).rejects.toMatchObject({ kind: "timeout" });
      llm.release();
      expect((await session.history()).map((t) => t.role)).toEqual(["user"]);
    });
  });

  describe("streamReply", () => {
    it("streams fragments then commits the full reply", async () => {
      const llm = new FakeLLM().enqueue("alpha beta gamma");
      const session = makeSession(llm);

      const chunks: string[] = [];
      let done: unknown;
      for await (const event of session.streamReply("Hello")) {
        if (event.type === "chunk") chunks.push(event.text);
        else done = event.reply.content;
      }

      expect(chunks).toEqual(["alpha ", "beta ", "gamma"]);
      expect(done).toBe("alpha beta gamma");
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello", "alpha beta gamma"]);
    });

    it("commits nothing for the reply when the consumer stops early", async () => {
      const llm = new FakeLLM().enqueue("alpha beta gamma");
      const session = makeSession(llm);

      for await (const event of session.streamReply("Hello")) {
        if (event.type === "chunk") break;
      }

      expect(session.busy).toBe(false);
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello"]);
    });

    it("surfaces cancellation and commits nothing for the reply", async () => {
      const llm = new FakeLLM().enqueue("alpha beta gamma");
      const session = makeSession(llm);
      const controller = new AbortController();

      const consume = async (): Promise<void> => {
        for await (const event of session.streamReply("Hello", { signal: controller.signal })) {
          if (event.type === "chunk") controller.abort();
        }
      };

      await expect(consume()).rejects.toMatchObject({ kind: "cancelled" });
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello"]);
    });
  });

  describe("streamReply deadline", () => {
    it("times out a stream that stalls and ignores the signal, then frees the session", async () => {
      const stalled: LLMProvider = {
        name: "stub",
        generate: async () => "unused",
        async *generateStream() {
          yield "first ";
          await new Promise<never>(() => {});
        },
      };
      const session = new SessionMemory(
        "s-1",
        IDENTITY,
        { ...CONFIG, timeoutMs: 50 },
        { providerFactory: () => stalled, now: clock() }
      );

      const chunks: string[] = [];
      const consume = async (): Promise<void> => {
        for await (const event of session.streamReply("Hello")) {
          if (event.type === "chunk") chunks.push(event.text);
        }
      };

      await expect(consume()).rejects.toMatchObject({ kind: "timeout" });
      expect(chunks).toEqual(["first "]);
      expect(session.busy).toBe(false);
      expect((await session.history()).map((t) => t.content)).toEqual(["Hello"]);
    });
  });

  describe("close", () => {
    it("rejects every operation after the session is closed", async () => {
      const session = makeSession(new FakeLLM());
      await session.addTurn("user", "Hello");
      session.close();

      await expect(session.history()).rejects.toThrow(SessionNotFound);
      await expect(session.addTurn("user", "again")).rejects.toThrow("Session not found: s-1");
      const stream = session.streamReply("Hello");
      await expect(stream.next()).rejects.toThrow(SessionNotFound);
      expect(session.busy).toBe(false);
    });
  });

  describe("rebind", () => {
    it("switches the provider and keeps memory", async () => {
      const first = new FakeLLM();
      const second = new FakeLLM({ name: "openai" }).enqueue("From second");
      const session = new SessionMemory("s-1", IDENTITY, CONFIG, {
        providerFactory: (identity) => (identity.provider === "openai" ? second : first),
        now: clock(),
      });
      await session.addTurn("user", "Hello");

      const identity = await session.rebind({ provider: "openai", model: "gpt-4o", temperature: 0.5, maxTokens: 200 });
      const result = await session.generateReply("Again");

      expect(identity).toEqual({ provider: "openai", model: "gpt-4o", temperature: 0.5, maxTokens: 200 });
      expect(result.reply.content).toBe("From second");
      expect(second.calls[0].messages.slice(1).map((m) => m.content)).toEqual(["Hello", "Again"]);
      expect(first.calls).toHaveLength(0);
      expect((await session.stats()).provider).toBe("openai");
    });
  });

  describe("export and import", () => {
    it("round-trips byte-identically and behaves the same afterwards", async () => {
      const llm = new FakeLLM().enqueue("Summary A", "- Fact one");
      const session = makeSession(llm);
      await addTurns(session, 1, 23);
      await session.getFacts();

      const exported = await session.export();
      const restored = SessionMemory.fromExport(JSON.parse(JSON.stringify(exported)), CONFIG, {
        providerFactory: () => new FakeLLM(),
        now: clock(5_000),
      });

      expect(JSON.stringify(await restored.export())).toBe(JSON.stringify(exported));
      expect(await restored.getFacts()).toEqual({ facts: ["Fact one"], stale: false, cached: true });
      const next = await restored.addTurn("user", "message 24");
      expect(next.turn.id).toBe(24);
    });

    it("resumes numbering after summaries when no turns are retained", async () => {
      const session = makeSession(new FakeLLM(), { maxMessages: 2, summaryThreshold: 2 });
      await addTurns(session, 1, 2);
      const restored = SessionMemory.fromExport(await session.export(), { ...CONFIG, maxMessages: 2, summaryThreshold: 2 }, {
        providerFactory: () => new FakeLLM(),
      });
      expect((await restored.addTurn("user", "three")).turn.id).toBe(3);
    });

    it("gives identical state for identical inputs", async () => {
      const run = async (): Promise<string> => {
        const session = makeSession(new FakeLLM().enqueue("Summary A"), { maxMessages: 10, summaryThreshold: 4 });
        await addTurns(session, 1, 9);
        return JSON.stringify(await session.export());
      };
      expect(await run()).toBe(await run());
    });
  });

  describe("invalid state", () => {
    it("rejects every later operation after an internal state error", async () => {
      const session = new SessionMemory("s-1", IDENTITY, CONFIG, {
        providerFactory: () => new FakeLLM(),
        search: {
          search: async () => {
            throw new InternalStateError("index corrupted");
          },
        },
      });
      await session.addTurn("user", "Hello");

      await expect(session.search("hello", 1)).rejects.toThrow("index corrupted");
      expect(session.isValid).toBe(false);
      await expect(session.addTurn("user", "Again")).rejects.toThrow(InternalStateError);
      await expect(session.stats()).rejects.toThrow("index corrupted");
    });
  });

  it("rejects a threshold above capacity", () => {
    expect(() => makeSession(new FakeLLM(), { maxMessages: 5, summaryThreshold: 6 })).toThrow(
      "summaryThreshold must not exceed maxMessages"
    );
  });
});
