import type { Logger } from "@idcore/shared";
import type { Emit, IdentityEvent, IdentityEventListener } from "./types.js";

/**
 * Buffers notifications raised while an operation runs and publishes them
 * only when the outermost operation returns. A failing operation, nested or
 * not, drops exactly the events it raised.
 */
export class EventJournal {
  private readonly logger: Logger;
  private readonly listeners = new Set<IdentityEventListener>();
  private buffer: IdentityEvent[] = [];
  private depth = 0;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  readonly emit: Emit = (event) => {
    this.buffer.push(event);
  };

  subscribe(listener: IdentityEventListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  transact<T>(run: () => T): T {
    const mark = this.buffer.length;
    this.depth += 1;
    let result: T;
    try {
      result = run();
    } catch (error) {
      this.buffer.length = mark;
      throw error;
    } finally {
      this.depth -= 1;
    }
    if (this.depth === 0) {
      this.publish();
    }
    return result;
  }

  private publish() {
    const events = this.buffer;
    this.buffer = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          // State is already committed; a listener cannot undo it.
          this.logger.error("event_listener_failed", { event: event.type, error });
        }
      }
    }
  }
}
