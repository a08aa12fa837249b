/**
 * Structured logging for the walkthrough.
 *
 * Domain packages never log. They write events to an EventStore, and the
 * demo forwards every stored event to pino.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { EventStore, Subscription } from "@custody/event-store";
import type { DemoConfig } from "./config.js";

/**
 * Build the demo logger. Development output goes through pino-pretty
 * unless an explicit destination is given.
 */
export function createLogger(
  config: Pick<DemoConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Log every event appended to `store` at debug level.
 */
export function attachEventLogger(store: EventStore, logger: Logger): Subscription {
  return store.subscribeAll((stored) => {
    logger.debug(
      {
        stream: stored.streamId,
        version: stored.version,
        actor: stored.event.metadata.actor,
        correlationId: stored.event.metadata.correlationId,
        payload: stored.event.payload,
      },
      stored.event.type,
    );
  });
}
