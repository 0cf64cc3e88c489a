/**
 * Immutable partial cipher -> plain letter map. `with` copies the (at most 26)
 * entries into a new value, so nodes that share an ancestor never see each
 * other's assignments.
 */
export class CharMapping {
  static readonly empty = new CharMapping(new Map<string, string>(), new Set<string>());

  private readonly table: ReadonlyMap<string, string>;
  private readonly used: ReadonlySet<string>;

  private constructor(table: ReadonlyMap<string, string>, used: ReadonlySet<string>) {
    this.table = table;
    this.used = used;
  }

  static from(entries: Iterable<readonly [string, string]>): CharMapping {
    let m = CharMapping.empty;
    for (const [cipher, plain] of entries) m = m.with(cipher, plain);
    return m;
  }

  get size(): number {
    return this.table.size;
  }

  get(cipher: string): string | undefined {
    return this.table.get(cipher);
  }

  has(cipher: string): boolean {
    return this.table.has(cipher);
  }

  isTarget(plain: string): boolean {
    return this.used.has(plain);
  }

  with(cipher: string, plain: string): CharMapping {
    if (this.table.has(cipher)) throw new RangeError(`"${cipher}" is already mapped to "${this.table.get(cipher)}"`);
    if (this.used.has(plain)) throw new RangeError(`"${plain}" is already a target`);
    const table = new Map(this.table);
    table.set(cipher, plain);
    const used = new Set(this.used);
    used.add(plain);
    return new CharMapping(table, used);
  }

  entries(): Array<[string, string]> {
    return [...this.table.entries()];
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.table);
  }

  /** Order-independent identity, used to detect repeated states. */
  key(): string {
    return this.entries()
      .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .map(([c, p]) => c + p)
      .join(",");
  }
}
