// backend/services/book/test/telemetry.spec.ts
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { buildApp } from "../src/app";
import { BookRepoError } from "../src/repo/errors";
import { guardTelemetry } from "../src/telemetry/guardedTelemetry";
import { instrumentBookRepo } from "../src/telemetry/instrumentBookRepo";
import type { Telemetry } from "../src/telemetry/telemetry";
import { expectCreated, expectOK, expectStatus } from "./helpers/http";
import { InMemoryBookRepo } from "./helpers/inMemoryBookRepo";
import {
  brokenTelemetry,
  RecordedSpan,
  RecordingTelemetry,
} from "./helpers/recordingTelemetry";

describe("broken telemetry", () => {
  it("never changes a response", async () => {
    const repo = instrumentBookRepo(
      new InMemoryBookRepo(),
      guardTelemetry(brokenTelemetry)
    );
    const app = buildApp({ repo, telemetry: brokenTelemetry });

    const created = await expectCreated(
      request(app)
        .post("/books")
        .send({ title: "A", author: "B", summary: "C" })
    );
    expect(created.body).toEqual({
      id: 1,
      title: "A",
      author: "B",
      summary: "C",
    });

    const listed = await expectOK(request(app).get("/books"));
    expect(listed.body).toEqual([
      { id: 1, title: "A", author: "B", summary: "C" },
    ]);

    await expectStatus(request(app).delete("/books?id=9"), 404);
  });
});

describe("guardTelemetry", () => {
  it("returns an already guarded instance unchanged", () => {
    const guarded = guardTelemetry(new RecordingTelemetry());
    expect(guardTelemetry(guarded)).toBe(guarded);
  });

  it("rethrows errors raised by the wrapped function", () => {
    const telemetry = guardTelemetry(new RecordingTelemetry());
    const span = telemetry.startSpan("work");
    expect(() =>
      telemetry.runInSpan(span, () => {
        throw new Error("handler failed");
      })
    ).toThrow("handler failed");
  });

  it("still runs the function when runInSpan itself throws", () => {
    const inner: Telemetry = {
      startSpan: (name) => new RecordedSpan(name),
      runInSpan() {
        throw new Error("context manager broke");
      },
      recordOperation() {},
    };
    const telemetry = guardTelemetry(inner);
    const fn = vi.fn(() => 42);
    expect(telemetry.runInSpan(telemetry.startSpan("work"), fn)).toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("operation metrics", () => {
  async function recorded(
    send: (app: ReturnType<typeof buildApp>) => PromiseLike<unknown>,
    repo = new InMemoryBookRepo()
  ) {
    const telemetry = new RecordingTelemetry();
    await send(buildApp({ repo, telemetry }));
    await vi.waitFor(() => expect(telemetry.operations).toHaveLength(1));
    return telemetry.operations[0];
  }

  it("labels a listing as get_all/success", async () => {
    const op = await recorded((app) => request(app).get("/books"));
    expect(op).toMatchObject({ operation: "get_all", outcome: "success" });
    expect(op?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("labels a bad id as get_by_id/invalid_book_id", async () => {
    const op = await recorded((app) => request(app).get("/books?id=x"));
    expect(op).toMatchObject({
      operation: "get_by_id",
      outcome: "invalid_book_id",
    });
  });

  it("labels malformed JSON as create/invalid_request_body", async () => {
    const op = await recorded((app) =>
      request(app)
        .post("/books")
        .set("Content-Type", "application/json")
        .send("{")
    );
    expect(op).toMatchObject({
      operation: "create",
      outcome: "invalid_request_body",
    });
  });

  it("labels a missing row as delete/book_not_found", async () => {
    const op = await recorded((app) => request(app).delete("/books?id=5"));
    expect(op).toMatchObject({
      operation: "delete",
      outcome: "book_not_found",
    });
  });

  it("labels repo failures with the handler's outcome", async () => {
    const repo = new InMemoryBookRepo().failWith(
      "update",
      new BookRepoError("query_failed", "statement failed")
    );
    const op = await recorded(
      (app) => request(app).put("/books?id=1").send({ title: "T" }),
      repo
    );
    expect(op).toMatchObject({ operation: "update", outcome: "update_failed" });
  });
});

describe("request and database spans", () => {
  it("nests the database span under the request span", async () => {
    const telemetry = new RecordingTelemetry();
    const base = new InMemoryBookRepo();
    await base.create({ title: "A", author: "B", summary: "C" });
    const repo = instrumentBookRepo(base, telemetry);
    const app = buildApp({ repo, telemetry });

    await expectOK(
      request(app).get("/books?id=1").set("User-Agent", "test-agent")
    );
    await vi.waitFor(() =>
      expect(telemetry.span("http.request")?.ended).toBe(true)
    );

    const http = telemetry.span("http.request");
    expect(http?.attributes).toEqual({
      "http.method": "GET",
      "http.url": "/books?id=1",
      "http.user_agent": "test-agent",
      "http.status_code": 200,
    });
    expect(http?.failure).toBeNull();

    const db = telemetry.span("db.query.get_book_by_id");
    expect(db?.attributes).toEqual({
      "db.table": "books",
      "db.operation": "SELECT",
      "db.query.id": 1,
      "books.count": 1,
    });
    expect(db?.ended).toBe(true);
    expect(http?.children).toContain(db);
  });

  it("fails the request span on a 5xx", async () => {
    const telemetry = new RecordingTelemetry();
    const repo = new InMemoryBookRepo().failWith(
      "findAll",
      new BookRepoError("query_failed", "statement failed")
    );
    await expectStatus(
      request(buildApp({ repo, telemetry })).get("/books"),
      500
    );
    await vi.waitFor(() =>
      expect(telemetry.span("http.request")?.ended).toBe(true)
    );
    expect(telemetry.span("http.request")?.failure?.reason).toBe("http_500");
  });
});

describe("instrumentBookRepo", () => {
  it("records the new id on insert", async () => {
    const telemetry = new RecordingTelemetry();
    const repo = instrumentBookRepo(new InMemoryBookRepo(), telemetry);

    await repo.create({ title: "T", author: "A", summary: "four" });

    expect(telemetry.spans).toHaveLength(1);
    expect(telemetry.spans[0]?.name).toBe("db.insert.book");
    expect(telemetry.spans[0]?.attributes).toEqual({
      "db.table": "books",
      "db.operation": "INSERT",
      "book.summary.length": 4,
      "book.id": 1,
    });
  });

  it("measures the summary in UTF-8 bytes", async () => {
    const telemetry = new RecordingTelemetry();
    const repo = instrumentBookRepo(new InMemoryBookRepo(), telemetry);

    await repo.create({ title: "T", author: "A", summary: "ßé" });

    expect(
      telemetry.span("db.insert.book")?.attributes["book.summary.length"]
    ).toBe(4);
  });

  it("records affected rows on update and delete", async () => {
    const telemetry = new RecordingTelemetry();
    const repo = instrumentBookRepo(new InMemoryBookRepo(), telemetry);

    await repo.update(3, { title: "T", author: "A", summary: "" });
    await repo.removeById(3);

    expect(telemetry.span("db.update.book")?.attributes).toMatchObject({
      "db.query.id": 3,
      "db.rows_affected": 0,
    });
    expect(telemetry.span("db.delete.book")?.attributes).toMatchObject({
      "db.query.id": 3,
      "db.rows_affected": 0,
    });
  });

  it("fails and ends the span, then rethrows", async () => {
    const telemetry = new RecordingTelemetry();
    const cause = new BookRepoError("decode_failed", "bad row");
    const repo = instrumentBookRepo(
      new InMemoryBookRepo().failWith("findAll", cause),
      telemetry
    );

    await expect(repo.findAll()).rejects.toBe(cause);

    const span = telemetry.span("db.query.get_all_books");
    expect(span?.failure).toEqual({ reason: "decode_failed", err: cause });
    expect(span?.ended).toBe(true);
  });

  it("labels unknown errors query_failed", async () => {
    const telemetry = new RecordingTelemetry();
    const repo = instrumentBookRepo(
      new InMemoryBookRepo().failWith("ping", new Error("boom")),
      telemetry
    );

    await expect(repo.ping()).rejects.toThrow("boom");
    expect(telemetry.span("db.ping")?.failure?.reason).toBe("query_failed");
  });
});
