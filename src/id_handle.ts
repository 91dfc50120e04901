// src/id_handle.ts

/**
 * The in-process object standing for a registered name's id.
 *
 * Handles are created by {@link IdRegistry} only; while a name is live every
 * lookup returns the same instance. Equality and hashing go by id alone.
 */
export class IdHandle {
  constructor(
    public readonly name: string,
    public readonly id: number,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof IdHandle && other.id === this.id;
  }

  hashCode(): number {
    return this.id;
  }

  toString(): string {
    return `${this.name}#${this.id}`;
  }
}
