type Handler<T> = (payload: T) => void;

export class EventBus<Events extends Record<string, unknown>> {
  private handlers: { [K in keyof Events]?: Set<Handler<Events[K]>> } = {};

  emit<K extends keyof Events>(eventName: K, payload: Events[K]): void {
    const set = this.handlers[eventName];
    if (!set) return;
    set.forEach((handler) => {
      handler(payload);
    });
  }

  on<K extends keyof Events>(eventName: K, handler: Handler<Events[K]>): () => void {
    const set = this.handlers[eventName] ?? new Set<Handler<Events[K]>>();
    set.add(handler);
    this.handlers[eventName] = set;
    return () => {
      const existing = this.handlers[eventName];
      if (!existing) return;
      existing.delete(handler);
      if (existing.size === 0) delete this.handlers[eventName];
    };
  }
}
