/**
 * Generic registry for pluggable implementations.
 */

export class Registry<T> {
  private readonly _map = new Map<string, () => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T): void {
    this._map.set(name.toLowerCase(), factory);
  }

  /** Build the implementation registered under `name`, if any. */
  find(name: string): T | undefined {
    const factory = this._map.get(name.toLowerCase());
    return factory ? factory() : undefined;
  }

  has(name: string): boolean {
    return this._map.has(name.toLowerCase());
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
