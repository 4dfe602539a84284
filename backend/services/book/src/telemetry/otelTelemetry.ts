// backend/services/book/src/telemetry/otelTelemetry.ts

/**
 * OpenTelemetry adapter over @opentelemetry/api only.
 *
 * The API is a no-op until a host registers an SDK (exporters, processors,
 * samplers). Wiring an SDK is deployment glue and lives outside this service.
 */

import {
  context,
  metrics,
  trace,
  SpanStatusCode,
  type Span,
} from "@opentelemetry/api";
import type {
  BookOperation,
  SpanAttributes,
  Telemetry,
  TelemetrySpan,
} from "./telemetry";

class OtelSpan implements TelemetrySpan {
  constructor(readonly span: Span) {}

  setAttributes(attributes: SpanAttributes): void {
    this.span.setAttributes(attributes);
  }

  fail(reason: string, err?: unknown): void {
    this.span.setAttribute("error", reason);
    if (err instanceof Error) {
      this.span.setAttribute("error.message", err.message);
      this.span.recordException(err);
    }
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: reason });
  }

  end(): void {
    this.span.end();
  }
}

export function createOtelTelemetry(
  serviceName: string,
  version: string
): Telemetry {
  const tracer = trace.getTracer(serviceName, version);
  const meter = metrics.getMeter(serviceName, version);

  const operations = meter.createCounter(`${serviceName}.operations`, {
    description: "Book operations by outcome",
  });
  const duration = meter.createHistogram(
    `${serviceName}.operation.duration`,
    { description: "Book operation latency", unit: "ms" }
  );

  return {
    startSpan(name, attributes) {
      return new OtelSpan(tracer.startSpan(name, { attributes }));
    },

    runInSpan(span, fn) {
      if (!(span instanceof OtelSpan)) return fn();
      return context.with(trace.setSpan(context.active(), span.span), fn);
    },

    recordOperation(operation: BookOperation, outcome, durationMs) {
      const attributes = { operation, outcome };
      operations.add(1, attributes);
      duration.record(durationMs, attributes);
    },
  };
}
