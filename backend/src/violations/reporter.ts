/**
 * Violation reporting
 *
 * The engine hands structured events to an external sink. Delivery is
 * best-effort: a throwing or rejecting sink is logged and otherwise ignored,
 * so it can never change the outcome of a check.
 */

import { nanoid } from "nanoid";
import type { ViolationEvent, ViolationEventCategory, ViolationEventType, ViolationSeverity } from "@ratewarden/shared";
import { sinkLog, type Logger } from "../logger";
import { describeError } from "../errors";
import { systemClock, type Clock } from "../runtime/clock";

export interface ViolationSink {
  report(event: ViolationEvent): void | Promise<void>;
}

export type ViolationEventInput = Omit<ViolationEvent, "id" | "timestamp" | "category" | "severity"> & {
  severity?: ViolationSeverity;
};

const CATEGORY: Record<ViolationEventType, ViolationEventCategory> = {
  rate_limit_exceeded: "security",
  suspicious_activity: "security",
  configuration_error: "operational",
  store_degraded: "operational",
};

const DEFAULT_SEVERITY: Record<ViolationEventType, ViolationSeverity> = {
  rate_limit_exceeded: "warning",
  suspicious_activity: "critical",
  configuration_error: "warning",
  store_degraded: "warning",
};

export class ViolationReporter {
  private sink: ViolationSink | null;
  private clock: Clock;

  constructor(sink: ViolationSink | null = null, clock: Clock = systemClock) {
    this.sink = sink;
    this.clock = clock;
  }

  /** Build the event and hand it to the sink without waiting for it. */
  emit(input: ViolationEventInput): ViolationEvent {
    const event: ViolationEvent = {
      ...input,
      id: nanoid(),
      category: CATEGORY[input.type],
      severity: input.severity ?? DEFAULT_SEVERITY[input.type],
      timestamp: this.clock.now(),
    };

    if (this.sink) deliver(this.sink, event);
    return event;
  }
}

function deliver(sink: ViolationSink, event: ViolationEvent, index?: number): void {
  try {
    const pending = sink.report(event);
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        sinkLog.error({ sink: index, type: event.type, error: describeError(error) }, "Violation sink rejected event");
      });
    }
  } catch (error) {
    sinkLog.error({ sink: index, type: event.type, error: describeError(error) }, "Violation sink threw");
  }
}

/** Writes every event to a pino logger at a level matching its severity. */
export function createLoggingSink(log: Logger = sinkLog): ViolationSink {
  return {
    report(event) {
      const fields = { ...event };
      const message = `Violation event: ${event.type}`;
      if (event.severity === "critical") log.error(fields, message);
      else if (event.severity === "warning") log.warn(fields, message);
      else log.info(fields, message);
    },
  };
}

/** Fan an event out to several sinks; one failing sink does not stop the others. */
export function createCompositeSink(...sinks: ViolationSink[]): ViolationSink {
  return {
    report(event) {
      sinks.forEach((sink, index) => deliver(sink, event, index));
    },
  };
}
