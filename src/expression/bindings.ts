/**
 * Read-only table of variable values produced by assignment statements.
 */
export class Bindings {
  private readonly values: ReadonlyMap<string, boolean>;

  constructor(values: Iterable<readonly [string, boolean]> = []) {
    this.values = new Map(values);
  }

  /**
   * Build a table from a plain record, e.g. `{ p: true, q: false }`
   */
  static from(record: Readonly<Record<string, boolean>>): Bindings {
    return new Bindings(Object.entries(record));
  }

  get(name: string): boolean | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Bound names, in the order they were first assigned
   */
  names(): string[] {
    return [...this.values.keys()];
  }

  toJSON(): Record<string, boolean> {
    return Object.fromEntries(this.values);
  }
}
