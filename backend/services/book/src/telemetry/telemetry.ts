// backend/services/book/src/telemetry/telemetry.ts

/**
 * Telemetry port for the book service.
 *
 * Instrumentation is a side channel: implementations may be absent, partial or
 * broken, and the request contract must hold regardless. The service always
 * talks to a `guardTelemetry(...)`-wrapped instance (see guardedTelemetry.ts).
 */

export type BookOperation =
  | "get_by_id"
  | "get_all"
  | "create"
  | "update"
  | "delete";

export type BookOutcome =
  | "success"
  | "invalid_request_body"
  | "missing_book_id"
  | "invalid_book_id"
  | "book_not_found"
  | "query_failed"
  | "decode_failed"
  | "create_failed"
  | "update_failed"
  | "delete_failed"
  | "request_aborted";

export type SpanAttributes = Record<string, string | number | boolean>;

export interface TelemetrySpan {
  setAttributes(attributes: SpanAttributes): void;
  /** Mark the span failed with a short reason (e.g. "query_failed"). */
  fail(reason: string, err?: unknown): void;
  end(): void;
}

export interface Telemetry {
  startSpan(name: string, attributes?: SpanAttributes): TelemetrySpan;
  /** Run fn with span as the active span, so nested spans become children. */
  runInSpan<T>(span: TelemetrySpan, fn: () => T): T;
  recordOperation(
    operation: BookOperation,
    outcome: string,
    durationMs: number
  ): void;
}

const noopSpan: TelemetrySpan = {
  setAttributes() {},
  fail() {},
  end() {},
};

export const noopTelemetry: Telemetry = {
  startSpan: () => noopSpan,
  runInSpan: (_span, fn) => fn(),
  recordOperation() {},
};
