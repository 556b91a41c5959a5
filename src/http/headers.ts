export type HeaderEntry = readonly [name: string, value: string];

export interface ReadonlyHeaders extends Iterable<HeaderEntry> {
  readonly size: number;
  get(name: string): string | undefined;
  getAll(name: string): string[];
  has(name: string): boolean;
}

/**
 * Ordered header multimap. Names compare case-insensitively and keep the
 * casing they were added with; a name may occur any number of times.
 */
export class HeaderList implements ReadonlyHeaders {
  private entries: [string, string][] = [];

  constructor(init?: Iterable<HeaderEntry>) {
    if (init) {
      for (const [name, value] of init) this.append(name, value);
    }
  }

  /** Builds a list from Node's flat `rawHeaders` array (`[name, value, name, value, ...]`). */
  static fromRaw(raw: readonly string[]): HeaderList {
    const list = new HeaderList();
    for (let i = 0; i + 1 < raw.length; i += 2) {
      list.append(raw[i], raw[i + 1]);
    }
    return list;
  }

  get size(): number {
    return this.entries.length;
  }

  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.entries.find(([n]) => n.toLowerCase() === key)?.[1];
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.entries.filter(([n]) => n.toLowerCase() === key).map(([, value]) => value);
  }

  has(name: string): boolean {
    const key = name.toLowerCase();
    return this.entries.some(([n]) => n.toLowerCase() === key);
  }

  /** Adds one more occurrence, leaving existing values in place. */
  append(name: string, value: string): this {
    this.entries.push([name, value]);
    return this;
  }

  /** Drops every occurrence of `name`, then appends the given value(s). */
  set(name: string, value: string | readonly string[]): this {
    this.delete(name);
    for (const v of typeof value === 'string' ? [value] : value) {
      this.entries.push([name, v]);
    }
    return this;
  }

  delete(name: string): boolean {
    const key = name.toLowerCase();
    const before = this.entries.length;
    this.entries = this.entries.filter(([n]) => n.toLowerCase() !== key);
    return this.entries.length !== before;
  }

  clone(): HeaderList {
    return new HeaderList(this.entries);
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries.map(([name, value]): HeaderEntry => [name, value])[Symbol.iterator]();
  }

  /** Node-style header object: lower-cased names, repeated names collapsed into arrays. */
  toObject(): Record<string, string | string[]> {
    const out: Record<string, string | string[]> = {};
    for (const [name, value] of this.entries) {
      const key = name.toLowerCase();
      const existing = out[key];
      if (existing === undefined) {
        out[key] = value;
      } else if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        out[key] = [existing, value];
      }
    }
    return out;
  }

  toJSON(): [string, string][] {
    return this.entries.map(([name, value]): [string, string] => [name, value]);
  }
}
