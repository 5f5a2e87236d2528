/**
 * Named factories for pluggable implementations, looked up from config.
 */
import { ConfigError, UsageError } from "./errors.js";

interface RegistryEntry<T> {
  readonly create: () => T;
  readonly summary: string;
}

export class Registry<T> {
  private readonly _entries = new Map<string, RegistryEntry<T>>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  /** Names are unique; registering one twice is a `UsageError`. */
  register(name: string, create: () => T, summary = ""): void {
    if (this._entries.has(name)) {
      throw new UsageError({
        message: `[${this.subsystem}] "${name}" is already registered`,
      });
    }
    this._entries.set(name, { create, summary });
  }

  /** Construct the named implementation; throws `ConfigError` for unknown names. */
  get(name: string): T {
    const entry = this._entries.get(name);
    if (!entry) {
      throw new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${this.list().join(", ")}`,
      });
    }
    return entry.create();
  }

  has(name: string): boolean {
    return this._entries.has(name);
  }

  list(): string[] {
    return [...this._entries.keys()];
  }

  /** One help line per entry, names padded to a common width. */
  describe(indent = "  "): string[] {
    const width = Math.max(0, ...this.list().map((n) => n.length));
    return [...this._entries].map(([name, { summary }]) =>
      `${indent}${name.padEnd(width)}  ${summary}`.trimEnd(),
    );
  }
}
