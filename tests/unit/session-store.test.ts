import { SessionStore } from "../../src/runtime/session-store.js";

describe("SessionStore", () => {
  it("keeps turns in insertion order", () => {
    const store = new SessionStore();
    store.append({ role: "user", text: "Hello" });
    store.append({ role: "assistant", text: "Hi there" });
    store.append({ role: "user", text: "How are you?" });

    expect(store.size).toBe(3);
    expect([...store.asContext()].map((turn) => `${turn.role}:${turn.text}`)).toEqual([
      "user:Hello",
      "assistant:Hi there",
      "user:How are you?",
    ]);
  });

  it("does not enforce user/assistant alternation", () => {
    const store = new SessionStore();
    store.append({ role: "user", text: "first" });
    store.append({ role: "user", text: "second" });

    expect(store.snapshot().map((turn) => turn.role)).toEqual(["user", "user"]);
  });

  it("stores frozen copies of appended turns", () => {
    const store = new SessionStore();
    const input = { role: "user" as const, text: "Hello", timestamp: "2026-01-01T00:00:00.000Z" };
    const stored = store.append(input);

    expect(stored).not.toBe(input);
    expect(stored).toEqual(input);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("omits the timestamp key when none is given", () => {
    const store = new SessionStore();
    const stored = store.append({ role: "assistant", text: "reply" });

    expect(Object.keys(stored)).toEqual(["role", "text"]);
  });

  it("returns a restartable context view bounded to the turns present when it was taken", () => {
    const store = new SessionStore();
    store.append({ role: "user", text: "one" });
    store.append({ role: "assistant", text: "two" });

    const context = store.asContext();
    store.append({ role: "user", text: "three" });

    expect([...context].map((turn) => turn.text)).toEqual(["one", "two"]);
    expect([...context].map((turn) => turn.text)).toEqual(["one", "two"]);
    expect([...store.asContext()].map((turn) => turn.text)).toEqual(["one", "two", "three"]);
  });

  it("limits the context to the newest turns, dropping the oldest first", () => {
    const store = new SessionStore();
    for (const text of ["a", "b", "c", "d", "e"]) {
      store.append({ role: "user", text });
    }

    expect([...store.asContext(2)].map((turn) => turn.text)).toEqual(["d", "e"]);
    expect([...store.asContext(10)].map((turn) => turn.text)).toEqual(["a", "b", "c", "d", "e"]);
    expect([...store.asContext(0)]).toHaveLength(5);
  });

  it("snapshot is detached from later appends", () => {
    const store = new SessionStore();
    store.append({ role: "user", text: "one" });
    const snapshot = store.snapshot();
    store.append({ role: "assistant", text: "two" });

    expect(snapshot).toHaveLength(1);
    expect(store.size).toBe(2);
  });

  it("clear starts a new transcript without touching earlier context views", () => {
    const store = new SessionStore();
    store.append({ role: "user", text: "old" });
    const before = store.asContext();

    store.clear();

    expect(store.size).toBe(0);
    expect([...store.asContext()]).toEqual([]);
    expect([...before].map((turn) => turn.text)).toEqual(["old"]);
  });
});
