import mongoose from "mongoose";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { IntegrityError, UnavailableError, ValidationError } from "src/lib/errors/app-errors";
import { LinkStatisticsStore } from "src/services/link-statistics/link-statistics-service";
import { InMemoryLinkStatisticsRepository } from "src/test/in-memory-link-statistics-repository";

describe("LinkStatisticsStore", () => {
  let repository: InMemoryLinkStatisticsRepository;
  let store: LinkStatisticsStore;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    repository = new InMemoryLinkStatisticsRepository(["abc123", "other"]);
    store = new LinkStatisticsStore(repository, { maxTextLength: 32 });
  });

  describe("record", () => {
    it("stores referer and user agent for an existing link", async () => {
      const id = await store.record("abc123", "https://example.com", "Mozilla/5.0");

      expect(await store.listByLink("abc123")).toEqual([
        { id, linkId: "abc123", referer: "https://example.com", userAgent: "Mozilla/5.0" },
      ]);
    });

    it("stores absent referer and user agent as null", async () => {
      await store.record("abc123");
      await store.record("abc123", undefined, null);

      const records = await store.listByLink("abc123");
      expect(records.map(({ referer, userAgent }) => [referer, userAgent])).toEqual([
        [null, null],
        [null, null],
      ]);
    });

    it("keeps an empty referer as an empty string", async () => {
      await store.record("abc123", "", "curl/8.0");

      const [record] = await store.listByLink("abc123");
      expect(record.referer).toBe("");
      expect(record.userAgent).toBe("curl/8.0");
    });

    it("assigns strictly increasing ids", async () => {
      const first = await store.record("abc123");
      const second = await store.record("other");
      const third = await store.record("abc123");

      expect(second).toBeGreaterThan(first);
      expect(third).toBeGreaterThan(second);
    });

    it("rejects an unknown link with an IntegrityError and persists nothing", async () => {
      await expect(store.record("missing", "https://example.com", "Mozilla/5.0")).rejects.toBeInstanceOf(
        IntegrityError
      );
      await expect(store.record("missing")).rejects.toThrow("Link missing does not exist");
      expect(repository.rows).toHaveLength(0);
    });

    it("rejects text over the configured length with a ValidationError", async () => {
      const tooLong = "x".repeat(33);

      await expect(store.record("abc123", tooLong)).rejects.toBeInstanceOf(ValidationError);
      await expect(store.record("abc123", null, tooLong)).rejects.toThrow(
        "userAgent must be at most 32 characters"
      );
      expect(repository.rows).toHaveLength(0);
    });

    it("accepts text at exactly the configured length", async () => {
      await expect(store.record("abc123", "x".repeat(32))).resolves.toBe(1);
    });

    it("counts characters outside the basic plane once", async () => {
      const thirtyTwoEmoji = "\u{1F600}".repeat(32);

      await expect(store.record("abc123", thirtyTwoEmoji)).resolves.toBe(1);
      await expect(store.record("abc123", `${thirtyTwoEmoji}\u{1F600}`)).rejects.toBeInstanceOf(ValidationError);
    });

    it("records every concurrent call with a distinct id", async () => {
      const ids = await Promise.all(
        Array.from({ length: 25 }, (_, i) => store.record("abc123", `https://ref-${i}.test`, null))
      );

      expect(new Set(ids).size).toBe(25);
      const records = await store.listByLink("abc123");
      expect(records).toHaveLength(25);
      expect(records.map((record) => record.id).sort((a, b) => a - b)).toEqual(
        [...ids].sort((a, b) => a - b)
      );
    });

    it("wraps unreachable storage in an UnavailableError", async () => {
      const cause = new mongoose.mongo.MongoNetworkError("connect ECONNREFUSED 127.0.0.1:27017");
      repository.failure = cause;

      const error = await store.record("abc123").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnavailableError);
      expect(error).toMatchObject({
        message: "Storage unavailable: connect ECONNREFUSED 127.0.0.1:27017",
        code: 503,
        cause,
      });
    });

    it("rethrows other storage errors unchanged", async () => {
      const failure = new Error("E11000 duplicate key error");
      repository.failure = failure;

      await expect(store.record("abc123")).rejects.toBe(failure);
    });
  });

  describe("listByLink", () => {
    it("returns an empty list for a link without statistics", async () => {
      await expect(store.listByLink("other")).resolves.toEqual([]);
      await expect(store.listByLink("never-created")).resolves.toEqual([]);
    });

    it("returns both records of the click example in id order", async () => {
      await store.record("abc123", "https://example.com", "Mozilla/5.0");
      await store.record("abc123", null, null);
      await store.record("other", "https://elsewhere.test", null);

      expect(await store.listByLink("abc123")).toEqual([
        { id: 1, linkId: "abc123", referer: "https://example.com", userAgent: "Mozilla/5.0" },
        { id: 2, linkId: "abc123", referer: null, userAgent: null },
      ]);
    });

    it("can be called repeatedly with the same result", async () => {
      await store.record("abc123", "https://example.com", null);

      const first = await store.listByLink("abc123");
      const second = await store.listByLink("abc123");
      expect(second).toEqual(first);
    });

    it("reports a timed out query as unavailable", async () => {
      repository.failure = Object.assign(new Error("operation exceeded time limit"), { code: 50 });

      await expect(store.listByLink("abc123")).rejects.toBeInstanceOf(UnavailableError);
    });
  });

  describe("countByLink", () => {
    it("groups records by referer and user agent, most frequent first", async () => {
      await store.record("abc123", "https://b.test", "Mozilla/5.0");
      await store.record("abc123", null, null);
      await store.record("abc123", "https://a.test", "Mozilla/5.0");
      await store.record("abc123", "https://b.test", "Mozilla/5.0");
      await store.record("other", "https://b.test", "Mozilla/5.0");

      expect(await store.countByLink("abc123")).toEqual([
        { amount: 2, referer: "https://b.test", userAgent: "Mozilla/5.0" },
        { amount: 1, referer: null, userAgent: null },
        { amount: 1, referer: "https://a.test", userAgent: "Mozilla/5.0" },
      ]);
    });

    it("returns an empty list for an unknown link", async () => {
      await expect(store.countByLink("missing")).resolves.toEqual([]);
    });
  });
});
