// backend/services/book/src/handlers/book/params.ts
import express, { type Request } from "express";
import type { IncomingMessage } from "node:http";
import { bookId } from "../../contracts/book";

export type IdParam =
  | { kind: "absent" }
  | { kind: "invalid"; raw: string }
  | { kind: "ok"; id: number };

/**
 * Reads `?id=`. Repeated params take the first value; an empty value counts
 * as absent.
 */
export function readIdParam(req: Request): IdParam {
  const q = req.query.id;
  const first = Array.isArray(q) ? q[0] : q;
  if (first === undefined || first === "") return { kind: "absent" };
  if (typeof first !== "string") return { kind: "invalid", raw: String(first) };

  const parsed = bookId.safeParse(first);
  return parsed.success
    ? { kind: "ok", id: parsed.data }
    : { kind: "invalid", raw: first };
}

const withBody = new WeakSet<IncomingMessage>();

/**
 * JSON parser for write routes. Bodies are decoded whatever their
 * Content-Type; requests whose parser read at least one byte are remembered
 * for `hasRequestBody`.
 */
export const jsonBody = express.json({
  type: () => true,
  limit: "1mb",
  verify: (req, _res, buf) => {
    if (buf.length > 0) withBody.add(req);
  },
});

/**
 * express.json() turns an empty body (chunked or not) into `{}`; a write
 * without a body must still be rejected.
 */
export function hasRequestBody(req: Request): boolean {
  return withBody.has(req);
}
