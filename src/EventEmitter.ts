// src/EventEmitter.ts

type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerMap<Events extends { [event: string]: unknown[] }> = {
  [E in keyof Events]?: Set<Listener<Events[E]>>;
};

class EventEmitter<Events extends { [event: string]: unknown[] }> {
  private eventMap: ListenerMap<Events> = {};

  public on<E extends keyof Events>(event: E, callback: Listener<Events[E]>): void {
    const callbacks = this.eventMap[event] ?? new Set<Listener<Events[E]>>();
    callbacks.add(callback);
    this.eventMap[event] = callbacks;
  }

  // Without a callback every listener for the event is removed
  public off<E extends keyof Events>(event: E, callback?: Listener<Events[E]>): void {
    const callbacks = this.eventMap[event];
    if (!callbacks) return;
    if (callback) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        delete this.eventMap[event];
      }
    } else {
      delete this.eventMap[event];
    }
  }

  public emit<E extends keyof Events>(event: E, ...data: Events[E]): void {
    const callbacks = this.eventMap[event];
    if (!callbacks) return;
    // Synchronous, in registration order
    for (const cb of [...callbacks]) {
      cb(...data);
    }
  }

  public listenerCount<E extends keyof Events>(event: E): number {
    return this.eventMap[event]?.size ?? 0;
  }
}

export default EventEmitter;
