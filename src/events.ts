/**
 * Engine event bus
 *
 * Handlers are awaited in registration order; a throwing handler is logged
 * and never affects the action that emitted the event.
 */

import { randomUUID } from "node:crypto";
import type { EngineLogger } from "./logging/logger.js";
import type { EngineEvent, EngineEventHandler, EngineEventType } from "./types.js";

export class EngineEventBus {
  private handlers: Map<EngineEventType, Set<EngineEventHandler>> = new Map();

  constructor(private logger: EngineLogger) {}

  on<T = unknown>(eventType: EngineEventType, handler: EngineEventHandler<T>): () => void {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }

    // Payload types are fixed per event type by the emitters.
    const registered = handler as EngineEventHandler;
    handlers.add(registered);

    return () => {
      this.handlers.get(eventType)?.delete(registered);
    };
  }

  async emit<T>(type: EngineEventType, source: string, data: T): Promise<void> {
    const handlers = this.handlers.get(type);
    if (!handlers || handlers.size === 0) return;

    const event: EngineEvent<T> = {
      id: `evt_${randomUUID()}`,
      type,
      timestamp: new Date(),
      source,
      data,
    };

    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (error) {
        this.logger.error(`Event handler error (${type}): ${String(error)}`);
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
