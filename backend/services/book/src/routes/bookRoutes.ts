// backend/services/book/src/routes/bookRoutes.ts
import {
  Router,
  type ErrorRequestHandler,
  type Request,
  type RequestHandler,
} from "express";
import { sendProblem } from "../../../shared/src/middleware/problemJson";
import * as BookController from "../controllers/bookController";
import { jsonBody } from "../handlers/book/params";
import type { BookRepo } from "../repo/bookRepo";
import { operationMetrics, setOutcome } from "../telemetry/middleware";
import type { BookOperation, Telemetry } from "../telemetry/telemetry";

export type BookRouteDeps = {
  repo: BookRepo;
  telemetry: Telemetry;
};

const ALLOWED = "GET, POST, PUT, DELETE";

const readOperation = (req: Request): BookOperation =>
  req.query.id === undefined || req.query.id === "" ? "get_all" : "get_by_id";

const methodNotAllowed: RequestHandler = (req, res) => {
  res.setHeader("Allow", ALLOWED);
  sendProblem(req, res, 405, "Method not allowed", "METHOD_NOT_ALLOWED");
};

const invalidBody: ErrorRequestHandler = (err: unknown, req, res, next) => {
  const type: unknown =
    typeof err === "object" && err !== null ? Reflect.get(err, "type") : "";
  if (type !== "entity.parse.failed") {
    next(err);
    return;
  }
  setOutcome(res, "invalid_request_body");
  sendProblem(req, res, 400, "Invalid request body", "INVALID_REQUEST_BODY");
};

// one-liners only, no logic here
export function createBookRouter({ repo, telemetry }: BookRouteDeps): Router {
  const router = Router();
  const metrics = (op: BookOperation | typeof readOperation) =>
    operationMetrics(telemetry, op);

  router
    .route("/")
    .get(metrics(readOperation), BookController.get(repo))
    .post(metrics("create"), jsonBody, BookController.create(repo))
    .put(metrics("update"), jsonBody, BookController.update(repo))
    .delete(metrics("delete"), BookController.remove(repo))
    // Without its own route, HEAD would fall through to the GET handler.
    .head(methodNotAllowed)
    .all(methodNotAllowed);

  router.use(invalidBody);

  return router;
}

export default createBookRouter;
