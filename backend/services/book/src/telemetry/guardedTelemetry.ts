// backend/services/book/src/telemetry/guardedTelemetry.ts

/**
 * Wraps a Telemetry so that no hook can fail or block a request: every call is
 * caught and logged at warn. A span that could not be started becomes a no-op.
 */

import { logger } from "../../../shared/src/utils/logger";
import type { SpanAttributes, Telemetry, TelemetrySpan } from "./telemetry";

function warn(hook: string, err: unknown): void {
  logger.warn({ component: "telemetry", hook, err }, "telemetry hook failed");
}

class GuardedSpan implements TelemetrySpan {
  constructor(readonly inner: TelemetrySpan | null) {}

  setAttributes(attributes: SpanAttributes): void {
    try {
      this.inner?.setAttributes(attributes);
    } catch (err) {
      warn("span.setAttributes", err);
    }
  }

  fail(reason: string, err?: unknown): void {
    try {
      this.inner?.fail(reason, err);
    } catch (hookErr) {
      warn("span.fail", hookErr);
    }
  }

  end(): void {
    try {
      this.inner?.end();
    } catch (err) {
      warn("span.end", err);
    }
  }
}

const guarded = new WeakSet<Telemetry>();

/** Idempotent: guarding a guarded instance returns it unchanged. */
export function guardTelemetry(inner: Telemetry): Telemetry {
  if (guarded.has(inner)) return inner;

  const telemetry: Telemetry = {
    startSpan(name, attributes) {
      try {
        return new GuardedSpan(inner.startSpan(name, attributes));
      } catch (err) {
        warn("startSpan", err);
        return new GuardedSpan(null);
      }
    },

    runInSpan(span, fn) {
      const target = span instanceof GuardedSpan ? span.inner : span;
      if (!target) return fn();
      let entered = false;
      try {
        return inner.runInSpan(target, () => {
          entered = true;
          return fn();
        });
      } catch (err) {
        // Errors from fn itself belong to the caller.
        if (entered) throw err;
        warn("runInSpan", err);
        return fn();
      }
    },

    recordOperation(operation, outcome, durationMs) {
      try {
        inner.recordOperation(operation, outcome, durationMs);
      } catch (err) {
        warn("recordOperation", err);
      }
    },
  };
  guarded.add(telemetry);
  return telemetry;
}
