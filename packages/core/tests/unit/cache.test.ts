// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryCacheBackend, SqliteCacheBackend, type CacheBackend } from "../../src/cache/backends.js";
import { ResultCache, deriveKey, stableStringify } from "../../src/cache/result-cache.js";
import { silentLogger } from "../helpers/fakes.js";

const HOUR = 60 * 60 * 1000;

describe("stableStringify()", () => {
  it("reduces Dates through toJSON", () => {
    expect(stableStringify({ at: new Date("2024-05-01T12:00:00Z") })).toBe('{"at":"2024-05-01T12:00:00.000Z"}');
  });

  it("sorts object keys at every depth and keeps array order", () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 1, e: 2 }] } })).toBe(
      '{"a":{"c":[3,{"e":2,"f":1}],"d":2},"b":1}',
    );
  });
});

describe("deriveKey()", () => {
  it("ignores parameter order", () => {
    expect(deriveKey("search", { q: "pino", limit: 5 })).toBe(deriveKey("search", { limit: 5, q: "pino" }));
  });

  it("is 16 hex characters", () => {
    expect(deriveKey("search", { q: "pino" })).toMatch(/^[0-9a-f]{16}$/);
  });

  it("tells Dates apart", () => {
    expect(deriveKey("q", { since: new Date("2020-01-01T00:00:00Z") })).not.toBe(
      deriveKey("q", { since: new Date("2025-01-01T00:00:00Z") }),
    );
  });

  it("tells Maps and Sets apart and ignores their insertion order", () => {
    expect(deriveKey("q", { tags: new Set(["a"]) })).not.toBe(deriveKey("q", { tags: new Set(["b"]) }));
    expect(deriveKey("q", { tags: new Set(["a", "b"]) })).toBe(deriveKey("q", { tags: new Set(["b", "a"]) }));
    expect(deriveKey("q", { m: new Map([["x", 1], ["y", 2]]) })).toBe(
      deriveKey("q", { m: new Map([["y", 2], ["x", 1]]) }),
    );
    expect(deriveKey("q", { m: new Map([["x", 1]]) })).not.toBe(deriveKey("q", { m: new Map([["x", 2]]) }));
  });

  it("depends on the query type", () => {
    expect(deriveKey("search", { q: "x" })).not.toBe(deriveKey("docs", { q: "x" }));
  });
});

function cacheContract(name: string, makeBackend: () => CacheBackend, cleanup: () => void = () => undefined) {
  describe(`ResultCache over ${name}`, () => {
    let now: number;
    let backend: CacheBackend;
    let cache: ResultCache;

    beforeEach(() => {
      now = 0;
      backend = makeBackend();
      cache = new ResultCache({ backend, ttlHours: 1, now: () => now, logger: silentLogger });
    });

    afterEach(() => {
      cache.close();
      cleanup();
    });

    it("returns what was stored", () => {
      const value = { hits: [{ title: "pino docs", score: 0.9 }], total: 1 };
      cache.set("search", { q: "pino" }, value);
      expect(cache.get("search", { q: "pino" })).toEqual(value);
    });

    it("does not serve one date's value for another", () => {
      cache.set("q", { since: new Date("2020-01-01T00:00:00Z") }, "old");
      expect(cache.get("q", { since: new Date("2025-01-01T00:00:00Z") })).toBeUndefined();
      expect(cache.get("q", { since: new Date("2020-01-01T00:00:00Z") })).toBe("old");
    });

    it("misses on unknown keys", () => {
      expect(cache.get("search", { q: "nothing" })).toBeUndefined();
    });

    it("keeps an entry exactly at the TTL and evicts it one ms later", () => {
      cache.set("search", { q: "pino" }, "v");
      now = HOUR;
      expect(cache.get("search", { q: "pino" })).toBe("v");
      now = HOUR + 1;
      expect(cache.get("search", { q: "pino" })).toBeUndefined();
      expect(cache.getStats().totalEntries).toBe(0);
    });

    it("overwrites and refreshes on set", () => {
      cache.set("search", { q: "a" }, 1);
      now = HOUR / 2;
      cache.set("search", { q: "a" }, 2);
      now = HOUR + 1;
      expect(cache.get("search", { q: "a" })).toBe(2);
    });

    it("clearExpired() removes only stale entries", () => {
      cache.set("search", { q: "old" }, 1);
      now = HOUR / 2;
      cache.set("docs", { page: "new" }, 2);
      now = HOUR + 1;

      const before = cache.getStats();
      expect(before.expiredEntries).toBe(1);
      expect(before.activeEntries).toBe(1);

      expect(cache.clearExpired()).toBe(1);
      expect(cache.getStats().totalEntries).toBe(1);
      expect(cache.get("docs", { page: "new" })).toBe(2);
    });

    it("reports type counts, size, hits and misses", () => {
      cache.set("search", { q: "x" }, "abc");
      cache.set("search", { q: "y" }, "abc");
      cache.set("docs", { page: 1 }, "abc");
      cache.get("search", { q: "x" });
      cache.get("search", { q: "z" });

      expect(cache.getStats()).toEqual({
        totalEntries: 3,
        activeEntries: 3,
        expiredEntries: 0,
        byType: { search: 2, docs: 1 },
        sizeBytes: 15,
        hits: 1,
        misses: 1,
        ttlHours: 1,
      });
    });

    it("clear() empties the cache", () => {
      cache.set("search", { q: "x" }, 1);
      expect(cache.clear()).toBe(1);
      expect(cache.getStats().totalEntries).toBe(0);
    });
  });
}

cacheContract("memory", () => new MemoryCacheBackend());

const sqliteDir = join(tmpdir(), "tandem-test", `cache-${process.pid}`);
const sqlitePath = join(sqliteDir, "cache.db");
cacheContract(
  "sqlite",
  () => {
    mkdirSync(sqliteDir, { recursive: true });
    return new SqliteCacheBackend(sqlitePath);
  },
  () => rmSync(sqliteDir, { recursive: true, force: true }),
);

describe("SqliteCacheBackend persistence", () => {
  const dir = join(tmpdir(), "tandem-test", `persist-${process.pid}`);
  const dbPath = join(dir, "nested", "cache.db");

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates missing directories and survives a reopen", () => {
    const first = new ResultCache({ backend: new SqliteCacheBackend(dbPath), logger: silentLogger });
    first.set("search", { q: "persist" }, { ok: true });
    first.close();

    const second = new ResultCache({ backend: new SqliteCacheBackend(dbPath), logger: silentLogger });
    expect(second.get("search", { q: "persist" })).toEqual({ ok: true });
    second.close();
  });
});
