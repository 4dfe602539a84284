// backend/services/book/test/book.properties.spec.ts
import request from "supertest";
import { describe, expect, it } from "vitest";
import { buildApp } from "../src/app";
import {
  expectCreated,
  expectNoContent,
  expectOK,
  expectStatus,
} from "./helpers/http";
import { InMemoryBookRepo } from "./helpers/inMemoryBookRepo";

const payloads = [
  { title: "A", author: "B", summary: "C" },
  { title: "", author: "", summary: "" },
  { title: "Quoted \"title\"", author: "O'Brien", summary: "line\nbreak" },
  { title: "Ünïcödé", author: "作者", summary: "🙂 summary" },
];

describe("book lifecycle", () => {
  it("walks create → get → delete → get", async () => {
    const app = buildApp({ repo: new InMemoryBookRepo() });

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

    const found = await expectOK(request(app).get("/books?id=1"));
    expect(found.body).toEqual([
      { id: 1, title: "A", author: "B", summary: "C" },
    ]);

    await expectNoContent(request(app).delete("/books?id=1"));

    const gone = await expectOK(request(app).get("/books?id=1"));
    expect(gone.body).toEqual([]);
  });

  it.each(payloads)("create then get returns the input (%o)", async (p) => {
    const app = buildApp({ repo: new InMemoryBookRepo() });
    const created = await expectCreated(request(app).post("/books").send(p));
    const id: unknown = created.body.id;
    expect(typeof id).toBe("number");

    const found = await expectOK(request(app).get(`/books?id=${String(id)}`));
    expect(found.body).toEqual([{ id, ...p }]);
  });

  it("lists N - M books after N creates and M deletes", async () => {
    const app = buildApp({ repo: new InMemoryBookRepo() });
    for (let i = 1; i <= 5; i++) {
      await expectCreated(
        request(app)
          .post("/books")
          .send({ title: `T${i}`, author: `A${i}`, summary: `S${i}` })
      );
    }
    await expectNoContent(request(app).delete("/books?id=2"));
    await expectNoContent(request(app).delete("/books?id=4"));
    await expectOK(
      request(app)
        .put("/books?id=5")
        .send({ title: "T5b", author: "A5", summary: "S5" })
    );

    const res = await expectOK(request(app).get("/books"));
    expect(res.body).toEqual([
      { id: 1, title: "T1", author: "A1", summary: "S1" },
      { id: 3, title: "T3", author: "A3", summary: "S3" },
      { id: 5, title: "T5b", author: "A5", summary: "S5" },
    ]);
  });

  it("applies the same update twice with the same result", async () => {
    const repo = new InMemoryBookRepo();
    const app = buildApp({ repo });
    await repo.create({ title: "Old", author: "X", summary: "Y" });
    const body = { title: "New", author: "X", summary: "Z" };

    await expectOK(request(app).put("/books?id=1").send(body));
    const first = await repo.findAll();
    await expectOK(request(app).put("/books?id=1").send(body));
    expect(await repo.findAll()).toEqual(first);
    expect(first).toEqual([{ id: 1, ...body }]);
  });

  it("leaves the data set unchanged on update/delete of a missing id", async () => {
    const repo = new InMemoryBookRepo();
    const app = buildApp({ repo });
    await repo.create({ title: "Keep", author: "Me", summary: "" });
    const before = await repo.findAll();

    await expectStatus(
      request(app).put("/books?id=2").send({ title: "Nope" }),
      404
    );
    await expectStatus(request(app).delete("/books?id=2"), 404);
    expect(await repo.findAll()).toEqual(before);
  });

  it("gives concurrent creates distinct ids", async () => {
    const app = buildApp({ repo: new InMemoryBookRepo() });
    const responses = await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        expectCreated(
          request(app)
            .post("/books")
            .send({ title: `T${i}`, author: "A", summary: "" })
        )
      )
    );
    const ids = responses.map((r): unknown => r.body.id);
    expect(new Set(ids).size).toBe(20);

    const all = await expectOK(request(app).get("/books"));
    expect(all.body).toHaveLength(20);
  });
});
