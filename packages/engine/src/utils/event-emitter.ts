export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Minimal typed emitter; listeners run synchronously in registration order.
 */
export class EventEmitter<Events extends EventMap> {
  private events: { [E in keyof Events]?: Listener<Events[E]>[] } = {};

  public on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const existing: Listener<Events[E]>[] | undefined = this.events[event];
    const listeners = existing ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners: Listener<Events[E]>[] | undefined = this.events[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const onceWrapper: Listener<Events[E]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const listeners: Listener<Events[E]>[] | undefined = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }
}
