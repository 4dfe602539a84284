// backend/services/book/test/startHttpService.spec.ts
import express from "express";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { startHttpService } from "../../shared/src/bootstrap/startHttpService";
import { buildApp } from "../src/app";
import { InMemoryBookRepo } from "./helpers/inMemoryBookRepo";

const quietLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("startHttpService", () => {
  it("binds an ephemeral port, serves, and stops once", async () => {
    const logger = quietLogger();
    const service = startHttpService({
      app: buildApp({ repo: new InMemoryBookRepo() }),
      port: 0,
      serviceName: "bookapi",
      logger,
      handleSignals: false,
    });

    const port = await service.listening;
    expect(port).toBeGreaterThan(0);
    expect(logger.info).toHaveBeenCalledWith(
      { service: "bookapi", port },
      "service listening"
    );

    const res = await request(`http://127.0.0.1:${port}`).get("/healthz");
    expect(res.status).toBe(200);
    expect(res.text).toBe("OK");

    const first = service.stop();
    expect(service.stop()).toBe(first);
    await first;
    expect(service.server.listening).toBe(false);
  });

  it("force-closes connections that outlive the grace period", async () => {
    const logger = quietLogger();
    // A request that never answers keeps its socket busy.
    const hang = vi.fn();
    const app = express();
    app.get("/hang", hang);
    app.use(buildApp({ repo: new InMemoryBookRepo() }));

    const service = startHttpService({
      app,
      port: 0,
      serviceName: "bookapi",
      logger,
      gracePeriodMs: 50,
      handleSignals: false,
    });
    const port = await service.listening;

    const hanging = request(`http://127.0.0.1:${port}`)
      .get("/hang")
      .then(
        () => "answered",
        () => "dropped"
      );
    await vi.waitFor(() => expect(hang).toHaveBeenCalledTimes(1));

    await service.stop();
    expect(await hanging).toBe("dropped");
    expect(logger.warn).toHaveBeenCalledWith(
      { service: "bookapi", gracePeriodMs: 50 },
      "grace period elapsed; closing remaining connections"
    );
  });

  it("does not install signal handlers when asked not to", async () => {
    const before = process.listenerCount("SIGTERM");
    const service = startHttpService({
      app: buildApp({ repo: new InMemoryBookRepo() }),
      port: 0,
      serviceName: "bookapi",
      logger: quietLogger(),
      handleSignals: false,
    });
    await service.listening;
    expect(process.listenerCount("SIGTERM")).toBe(before);
    await service.stop();
  });
});
