import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ChatCompletionApi, CompletionRequest, StreamHandler } from "../../src/core/api/chat-completion.js";
import { ConversationBusyError, ProviderRateLimitedError, ProviderUnavailableError } from "../../src/core/errors.js";
import { ConversationController, buildContextMessages } from "../../src/runtime/chat-service.js";
import { HistoryArchive, type HistoryEntry } from "../../src/runtime/history-archive.js";
import type { ChatCompletionResponse, ChatMessage } from "../../src/types/chat.js";

class FakeApi implements ChatCompletionApi {
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  private next(request: CompletionRequest): string {
    this.requests.push(request.messages.map((message) => ({ ...message })));
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("no reply queued");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    return { content: this.next(request), raw: {} };
  }

  async stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse> {
    const content = this.next(request);
    for (const word of content.split(" ")) {
      handlers?.onToken?.(word);
    }
    return { content, raw: { streamed: true } };
  }
}

function fixedClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

describe("ConversationController", () => {
  it("appends a user/assistant pair per successful submission, in order", async () => {
    const api = new FakeApi(["r1", "r2", "r3"]);
    const controller = new ConversationController({ api });

    for (const text of ["q1", "q2", "q3"]) {
      const outcome = await controller.submit(text);
      expect(outcome.status).toBe("replied");
    }

    expect(controller.store.size).toBe(6);
    expect(controller.store.snapshot().map((turn) => `${turn.role}:${turn.text}`)).toEqual([
      "user:q1",
      "assistant:r1",
      "user:q2",
      "assistant:r2",
      "user:q3",
      "assistant:r3",
    ]);
  });

  it("returns the reply turn to the caller", async () => {
    const controller = new ConversationController({ api: new FakeApi(["Hi!"]), now: fixedClock() });

    const outcome = await controller.submit("Hello");

    expect(outcome).toEqual({
      status: "replied",
      reply: { role: "assistant", text: "Hi!", timestamp: "2026-01-01T00:00:01.000Z" },
    });
    expect(controller.store.snapshot()[0].timestamp).toBe("2026-01-01T00:00:00.000Z");
  });

  it("treats empty and whitespace-only input as a no-op", async () => {
    const api = new FakeApi(["unused"]);
    const controller = new ConversationController({ api });

    await expect(controller.submit("")).resolves.toEqual({ status: "skipped", reason: "empty-input" });
    await expect(controller.submit("   ")).resolves.toEqual({ status: "skipped", reason: "empty-input" });

    expect(controller.store.size).toBe(0);
    expect(api.requests).toHaveLength(0);
  });

  it("trims the submitted text", async () => {
    const api = new FakeApi(["ok"]);
    const controller = new ConversationController({ api });

    await controller.submit("  Hello  ");

    expect(api.requests[0]).toEqual([{ role: "user", content: "Hello" }]);
  });

  it("keeps the user turn and surfaces the error when the provider fails", async () => {
    const failure = new ProviderUnavailableError("gemini is unreachable: connection reset");
    const api = new FakeApi(["first", failure, "third"]);
    const controller = new ConversationController({ api });

    await controller.submit("one");
    await expect(controller.submit("two")).rejects.toBe(failure);

    expect(controller.store.size).toBe(3);
    expect(controller.store.snapshot()[2]).toEqual(expect.objectContaining({ role: "user", text: "two" }));
    expect(controller.state).toBe("idle");

    await controller.submit("three");
    expect(api.requests[2]).toEqual([
      { role: "user", content: "one" },
      { role: "assistant", content: "first" },
      { role: "user", content: "two" },
      { role: "user", content: "three" },
    ]);
  });

  it("passes each provider error kind through unchanged", async () => {
    const limited = new ProviderRateLimitedError("slow down", 30);
    const controller = new ConversationController({ api: new FakeApi([limited]) });

    await expect(controller.submit("hi")).rejects.toBeInstanceOf(ProviderRateLimitedError);
    expect(controller.store.size).toBe(1);
  });

  it("sends all prior turns plus the new message on the second call", async () => {
    const api = new FakeApi(["Hello! How can I help?", "Doing well."]);
    const controller = new ConversationController({ api });

    await controller.submit("Hello");
    await controller.submit("How are you?");

    expect(controller.store.size).toBe(4);
    expect(api.requests[1]).toEqual([
      { role: "user", content: "Hello" },
      { role: "assistant", content: "Hello! How can I help?" },
      { role: "user", content: "How are you?" },
    ]);
  });

  it("rejects a second submit while a reply is outstanding", async () => {
    let release: (response: ChatCompletionResponse) => void = () => undefined;
    const calls: CompletionRequest[] = [];
    const api: ChatCompletionApi = {
      complete: (request) => {
        calls.push(request);
        return new Promise<ChatCompletionResponse>((resolve) => {
          release = resolve;
        });
      },
      stream: () => Promise.reject(new Error("not used")),
    };
    const controller = new ConversationController({ api });

    const first = controller.submit("first");
    expect(controller.state).toBe("awaiting-reply");

    await expect(controller.submit("second")).rejects.toBeInstanceOf(ConversationBusyError);
    expect(controller.store.size).toBe(1);
    expect(calls).toHaveLength(1);

    release({ content: "done", raw: {} });
    await expect(first).resolves.toEqual(expect.objectContaining({ status: "replied" }));
    expect(controller.state).toBe("idle");
    expect(controller.store.size).toBe(2);
  });

  it("prepends the system prompt to the context", async () => {
    const api = new FakeApi(["ok"]);
    const controller = new ConversationController({ api, systemPrompt: "  Be brief.  " });

    await controller.submit("hi");

    expect(api.requests[0]).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "hi" },
    ]);
  });

  it("bounds the context to the newest turns when configured", async () => {
    const api = new FakeApi(["a1", "a2", "a3"]);
    const controller = new ConversationController({ api, contextMaxTurns: 3 });

    await controller.submit("q1");
    await controller.submit("q2");
    await controller.submit("q3");

    expect(api.requests[2]).toEqual([
      { role: "user", content: "q2" },
      { role: "assistant", content: "a2" },
      { role: "user", content: "q3" },
    ]);
    expect(controller.store.size).toBe(6);
  });

  it("streams tokens to the caller when streaming is enabled", async () => {
    const api = new FakeApi(["one two three"]);
    const controller = new ConversationController({ api, stream: true });
    const tokens: string[] = [];

    const outcome = await controller.submit("count", { onToken: (token) => tokens.push(token) });

    expect(tokens).toEqual(["one", "two", "three"]);
    expect(outcome.status === "replied" ? outcome.reply.text : "").toBe("one two three");
  });

  it("reset clears the transcript only when idle", async () => {
    let release: (response: ChatCompletionResponse) => void = () => undefined;
    const api: ChatCompletionApi = {
      complete: () =>
        new Promise<ChatCompletionResponse>((resolve) => {
          release = resolve;
        }),
      stream: () => Promise.reject(new Error("not used")),
    };
    const controller = new ConversationController({ api });

    const pending = controller.submit("hello");
    expect(() => controller.reset()).toThrow(ConversationBusyError);

    release({ content: "hi", raw: {} });
    await pending;
    controller.reset();

    expect(controller.store.size).toBe(0);
  });

  describe("history archive", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "foxchat-controller-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("records successful question/answer pairs", async () => {
      const archive = new HistoryArchive(path.join(dir, "history.jsonl"));
      const controller = new ConversationController({ api: new FakeApi(["Paris"]), archive, now: fixedClock() });

      await controller.submit("Capital of France?");

      await expect(controller.searchHistory("paris")).resolves.toEqual([
        { question: "Capital of France?", answer: "Paris", createdAt: "2026-01-01T00:00:02.000Z" },
      ]);
    });

    it("does not record failed turns", async () => {
      const archive = new HistoryArchive(path.join(dir, "history.jsonl"));
      const controller = new ConversationController({
        api: new FakeApi([new ProviderUnavailableError("down")]),
        archive,
      });

      await expect(controller.submit("anyone there?")).rejects.toBeInstanceOf(ProviderUnavailableError);
      await expect(archive.readAll()).resolves.toEqual([]);
    });

    it("logs archive failures without failing the turn", async () => {
      class FailingArchive extends HistoryArchive {
        async record(): Promise<HistoryEntry> {
          throw new Error("disk full");
        }
      }
      const lines: string[] = [];
      const controller = new ConversationController({
        api: new FakeApi(["fine"]),
        archive: new FailingArchive("/tmp/unused.jsonl"),
        log: (line) => lines.push(line),
      });

      await expect(controller.submit("hi")).resolves.toEqual(expect.objectContaining({ status: "replied" }));
      expect(lines).toEqual(["[archive] status=failed file=/tmp/unused.jsonl error=disk full"]);
      expect(controller.store.size).toBe(2);
    });
  });

  it("searchHistory returns nothing when no archive is configured", async () => {
    const controller = new ConversationController({ api: new FakeApi([]) });

    expect(controller.archiveEnabled).toBe(false);
    await expect(controller.searchHistory("anything")).resolves.toEqual([]);
  });
});

describe("buildContextMessages", () => {
  it("maps turns to chat messages and skips a blank system prompt", () => {
    expect(
      buildContextMessages(
        [
          { role: "user", text: "q" },
          { role: "assistant", text: "a" },
        ],
        "   ",
      ),
    ).toEqual([
      { role: "user", content: "q" },
      { role: "assistant", content: "a" },
    ]);
  });
});
