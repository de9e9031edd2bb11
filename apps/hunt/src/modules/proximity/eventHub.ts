/**
 * EventHub: typed listener registry owned by one engine instance.
 *
 * `Events` maps event names to listener signatures, the same shape as a
 * socket event map. A listener that throws is logged and skipped; the
 * remaining listeners still run.
 */

type ArgsOf<F> = F extends (...args: infer A extends unknown[]) => unknown ? A : never;

export type Listener<Events, K extends keyof Events> = (...args: ArgsOf<Events[K]>) => void;

export class EventHub<Events> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events, K>> } = {};

  constructor(private tag: string) {}

  /** Subscribe. Returns a function that removes this listener. */
  on<K extends keyof Events>(event: K, listener: Listener<Events, K>): () => void {
    let set = this.listeners[event];
    if (!set) {
      set = new Set<Listener<Events, K>>();
      this.listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events, K>): void {
    const set = this.listeners[event];
    if (!set) return;
    set.delete(listener);
    if (set.size === 0) delete this.listeners[event];
  }

  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
      return;
    }
    delete this.listeners[event];
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  emit<K extends keyof Events>(event: K, ...args: ArgsOf<Events[K]>): void {
    const set = this.listeners[event];
    if (!set) return;

    // Snapshot so a listener may unsubscribe itself mid-emit
    for (const listener of Array.from(set)) {
      try {
        listener(...args);
      } catch (err) {
        console.error(`${this.tag} Listener for ${String(event)} threw:`, err);
      }
    }
  }
}
