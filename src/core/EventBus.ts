/**
 * Simple typed event bus. Listeners subscribe per event name; the payload
 * type is taken from the event map the bus is created with.
 */

type EventHandler<T> = (data: T) => void;

type HandlerTable<Events> = {
  [K in keyof Events]?: Set<EventHandler<Events[K]>>;
};

export class EventBus<Events extends object> {
  private handlers: HandlerTable<Events> = {};

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Events[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);

    // Return unsubscribe function
    return () => {
      this.handlers[event]?.delete(handler);
    };
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    this.handlers[event]?.forEach(handler => {
      try {
        handler(data);
      } catch (e) {
        console.error(`Error in event handler for '${String(event)}':`, e);
      }
    });
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }
}
