/**
 * Generic, strictly-typed event emitter.
 *
 * Unlike Node's built-in EventEmitter, this provides compile-time safety
 * for event names and handler signatures. Emission is synchronous and in
 * registration order, which matches the engine's one-event-at-a-time model.
 *
 * @typeParam EventMap - An interface mapping event names to handler signatures.
 *
 * @example
 * ```typescript
 * interface TrialEvents {
 *   trial: (result: TrialResult) => void;
 * }
 *
 * class Recorder extends TypedEventEmitter<TrialEvents> {
 *   finish(result: TrialResult) {
 *     this.emit("trial", result);
 *   }
 * }
 *
 * const off = new Recorder().on("trial", (r) => console.log(r.throughput));
 * off();
 * ```
 */

// Handlers are stored untyped; the public generics carry the safety.
type AnyHandler = (...args: unknown[]) => void;

export class TypedEventEmitter<
  EventMap extends Record<keyof EventMap, (...args: never[]) => void>,
> {
  private readonly listeners = new Map<keyof EventMap, Set<AnyHandler>>();

  /** Label used when reporting a listener that threw. */
  protected readonly emitterName: string;

  constructor(emitterName: string) {
    this.emitterName = emitterName;
  }

  /**
   * Register a handler for an event.
   * Returns an unsubscribe function.
   */
  on<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(handler as unknown as AnyHandler);
    return () => this.off(event, handler);
  }

  /** Remove a previously registered handler. No-op if it was never added. */
  off<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): void {
    this.listeners.get(event)?.delete(handler as unknown as AnyHandler);
  }

  /** Return the number of listeners registered for `event`. */
  listenerCount<E extends keyof EventMap & string>(event: E): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Remove all listeners, optionally for a specific event only. */
  removeAllListeners<E extends keyof EventMap & string>(event?: E): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Call every handler for `event` with `args`.
   *
   * Listeners must not throw; if one does, the error is logged and the
   * remaining listeners still run. Handlers added or removed during
   * emission take effect from the next emit.
   *
   * @returns `true` if any handlers were called.
   */
  protected emit<E extends keyof EventMap & string>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): boolean {
    const set = this.listeners.get(event);
    if (!set || set.size === 0) return false;

    for (const handler of [...set]) {
      try {
        handler(...(args as unknown[]));
      } catch (err) {
        console.error(`${this.emitterName}: listener threw during "${event}"`, err);
      }
    }

    return true;
  }
}
