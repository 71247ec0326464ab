import { describe, expect, it, vi } from "vitest";
import { IndexingEngine, MemorySenderIndex, createInMemoryEngine } from "../../index.js";
import { InternalInvariantError, InvalidInputError, RecordNotFoundError } from "../../errors.js";
import type { MessageRecord } from "../../types.js";

const ids = (records: Iterable<MessageRecord>) => Array.from(records, (r) => r.id);

function seeded(): IndexingEngine {
  const engine = createInMemoryEngine();
  engine.ingest({ sender: "a@x.com", subject: "Hi", body: "Hi there", date: "2025-01-02" });
  engine.ingest({ sender: "b@x.com", subject: "Yo", body: "Hi all", date: "2025-01-01" });
  return engine;
}

describe("IndexingEngine", () => {
  it("serves the three access patterns", () => {
    const engine = seeded();

    expect(Array.from(engine.allOrdered(), (r) => r.sender)).toEqual(["b@x.com", "a@x.com"]);
    expect(ids(engine.bySender("a@x.com"))).toEqual([1]);
    expect(ids(engine.byKeyword("hi")).sort()).toEqual([1, 2]);
    expect(ids(engine.byKeyword("there"))).toEqual([1]);
  });

  it("returns the stored record by id", () => {
    const engine = createInMemoryEngine();
    const input = { sender: "a@x.com", subject: "Report", body: "Attached.", date: "2025-03-04T10:00:00Z" };
    const record = engine.ingest(input);
    expect(engine.getById(record.id)).toEqual({ id: 1, ...input });
    expect(() => engine.getById(2)).toThrow(RecordNotFoundError);
  });

  it("matches keywords case-insensitively and exactly", () => {
    const engine = seeded();
    expect(ids(engine.byKeyword("HI")).sort()).toEqual([1, 2]);
    expect(engine.byKeyword("h").size).toBe(0);
    expect(engine.byKeyword("hi there").size).toBe(0);
    expect(engine.byKeyword("").size).toBe(0);
    expect(engine.byKeyword("yo").size).toBe(1);
  });

  it("returns empty results for unknown senders and words", () => {
    const engine = seeded();
    expect(engine.bySender("nobody@x.com")).toEqual([]);
    expect(engine.byKeyword("missing").size).toBe(0);
  });

  it("indexes a message with an empty subject and body by date and sender only", () => {
    const engine = createInMemoryEngine();
    const r = engine.ingest({ sender: "a@x.com", subject: "", body: "", date: "" });
    expect(ids(engine.allOrdered())).toEqual([r.id]);
    expect(ids(engine.bySender("a@x.com"))).toEqual([r.id]);
    expect(engine.stats().terms).toBe(0);
  });

  it("rejects an empty sender and leaves every index unchanged", () => {
    const engine = seeded();
    const before = { all: ids(engine.allOrdered()), hi: ids(engine.byKeyword("hi")), stats: engine.stats() };

    expect(() => engine.ingest({ sender: "", subject: "Hi", body: "new words", date: "2024-12-31" })).toThrow(InvalidInputError);

    expect(ids(engine.allOrdered())).toEqual(before.all);
    expect(ids(engine.byKeyword("hi"))).toEqual(before.hi);
    expect(engine.byKeyword("new").size).toBe(0);
    expect(engine.bySender("")).toEqual([]);
    expect(engine.stats()).toEqual(before.stats);

    expect(engine.ingest({ sender: "c@x.com", subject: "", body: "", date: "2025-01-03" }).id).toBe(3);
  });

  it("keeps ties in ingest order and dates non-decreasing", () => {
    const engine = createInMemoryEngine();
    const dates = ["2025-02-01", "2025-01-01", "2025-02-01", "2024-12-31", "2025-01-01", "2025-02-01"];
    dates.forEach((date, i) => engine.ingest({ sender: `s${i % 2}@x.com`, subject: "", body: "", date }));

    const ordered = Array.from(engine.allOrdered());
    expect(ordered.map((r) => r.id)).toEqual([4, 2, 5, 1, 3, 6]);
    for (let i = 1; i < ordered.length; i++) {
      expect(ordered[i - 1]!.date <= ordered[i]!.date).toBe(true);
    }
    expect(ids(engine.bySender("s0@x.com"))).toEqual([1, 3, 5]);
  });

  it("indexes exactly the distinct tokens of subject and body", () => {
    const engine = createInMemoryEngine();
    const r = engine.ingest({ sender: "a@x.com", subject: "Budget-2025", body: "budget, BUDGET; review!", date: "x" });

    for (const word of ["budget", "2025", "review"]) {
      expect(ids(engine.byKeyword(word))).toEqual([r.id]);
    }
    expect(engine.byKeyword("budget-2025").size).toBe(0);
    expect(engine.stats().terms).toBe(3);
  });

  it("does not join the last subject token with the first body token", () => {
    const engine = createInMemoryEngine();
    engine.ingest({ sender: "a@x.com", subject: "foo", body: "bar", date: "x" });
    expect(engine.byKeyword("foobar").size).toBe(0);
    expect(engine.byKeyword("foo").size).toBe(1);
    expect(engine.byKeyword("bar").size).toBe(1);
  });

  it("returns identical results on repeated reads", () => {
    const engine = seeded();
    expect(ids(engine.allOrdered())).toEqual(ids(engine.allOrdered()));
    expect(engine.bySender("a@x.com")).toEqual(engine.bySender("a@x.com"));
    expect(ids(engine.byKeyword("hi"))).toEqual(ids(engine.byKeyword("hi")));
  });

  it("reports index statistics", () => {
    const engine = seeded();
    engine.ingest({ sender: "a@x.com", subject: "Hi", body: "again", date: "2025-01-02" });
    expect(engine.stats()).toEqual({ messages: 3, dates: 2, treeHeight: 2, senders: 2, terms: 5 });
  });

  it("fails fatally when an index update throws after the record is stored", () => {
    const senders = new MemorySenderIndex();
    const engine = createInMemoryEngine({ senders });
    engine.ingest({ sender: "a@x.com", subject: "ok", body: "", date: "2025-01-01" });

    const boom = new Error("sender index broken");
    vi.spyOn(senders, "insert").mockImplementation(() => {
      throw boom;
    });
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

    let thrown: unknown;
    try {
      engine.ingest({ sender: "b@x.com", subject: "fails", body: "", date: "2025-01-02" });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(InternalInvariantError);
    expect(thrown).toMatchObject({ code: "INTERNAL_INVARIANT", cause: boom });
    expect(consoleError).toHaveBeenCalledTimes(1);

    expect(() => engine.getById(1)).toThrow(InternalInvariantError);
    expect(() => engine.bySender("a@x.com")).toThrow(InternalInvariantError);
    expect(() => Array.from(engine.allOrdered())).toThrow(InternalInvariantError);
    expect(() => engine.ingest({ sender: "c@x.com", subject: "", body: "", date: "" })).toThrow(InternalInvariantError);

    consoleError.mockRestore();
  });

  it("agrees with a brute-force scan over generated messages", () => {
    const engine = createInMemoryEngine();
    const words = ["alpha", "Beta", "gamma", "delta", "EPSILON", "zeta"];
    const senders = ["x@a.com", "y@a.com", "z@a.com"];
    let seed = 7;
    const next = (n: number) => {
      seed = (seed * 16807) % 2147483647;
      return seed % n;
    };

    const inputs = Array.from({ length: 60 }, () => ({
      sender: senders[next(senders.length)]!,
      subject: words[next(words.length)]!,
      body: `${words[next(words.length)]}, ${words[next(words.length)]}!`,
      date: `2025-0${1 + next(3)}-1${next(3)}`,
    }));
    const records = inputs.map((input) => engine.ingest(input));

    const expectedOrder = [...records].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.id - b.id));
    expect(ids(engine.allOrdered())).toEqual(ids(expectedOrder));

    for (const s of senders) {
      expect(ids(engine.bySender(s))).toEqual(records.filter((r) => r.sender === s).map((r) => r.id));
    }

    for (const w of words) {
      const lower = w.toLowerCase();
      const expected = records
        .filter((r) => `${r.subject} ${r.body}`.toLowerCase().split(/[^a-z0-9]+/).includes(lower))
        .map((r) => r.id);
      expect(ids(engine.byKeyword(w)).sort((a, b) => a - b)).toEqual(expected);
    }
  });
});
