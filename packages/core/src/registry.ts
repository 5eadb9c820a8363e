/**
 * Generic registry for pluggable implementations.
 */
import { ArgumentError } from "./errors.js";

export class Registry<T> {
  private readonly _map = new Map<string, () => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T): void {
    this._map.set(name, factory);
  }

  get(name: string): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new ArgumentError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory();
  }

  /** Like get(), but resolves unknown names to `fallback` instead of throwing. */
  getOr(name: string, fallback: string): T {
    return this.get(this._map.has(name) ? name : fallback);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
