/**
 * SyncMap is a map tuned for keys that are written once and read many times.
 *
 * Reads are served from an immutable snapshot (`read`). Stores to keys the
 * snapshot does not hold go to a `dirty` map, which is promoted to a fresh
 * snapshot once enough lookups have missed the snapshot to pay for the copy.
 * Iteration always walks a snapshot, so callbacks may store and delete freely.
 */

/**
 * Immutable view of the map contents. `amended` is set when the dirty map
 * holds keys missing from `m`.
 */
interface ReadOnly {
  readonly m: Map<unknown, Entry>;
  readonly amended: boolean;
}

/**
 * Marks entries that were deleted and are not present in the dirty map.
 */
const expunged: unique symbol = Symbol("expunged");

export class SyncMap {
  private read: ReadOnly = { m: new Map(), amended: false };
  private dirty: Map<unknown, Entry> | undefined = undefined;
  private misses = 0;

  /**
   * Returns the value stored under `key`, and whether one was present.
   */
  load(key: unknown): [value: unknown, ok: boolean] {
    const read = this.read;
    let e = read.m.get(key);
    if (e === undefined && read.amended) {
      e = this.dirty?.get(key);
      this.missLocked();
    }
    if (e === undefined) {
      return [undefined, false];
    }
    return e.load();
  }

  /**
   * Sets the value for a key.
   */
  store(...[key, value]: [unknown, unknown]): void {
    const read = this.read;
    const e = read.m.get(key);
    if (e !== undefined && e.tryStore(value)) {
      return;
    }
    if (e !== undefined) {
      // Expunged entries are missing from the dirty map.
      if (e.unexpungeLocked()) {
        this.dirtyLocked().set(key, e);
      }
      e.storeLocked(value);
      return;
    }
    const d = this.dirty?.get(key);
    if (d !== undefined) {
      d.storeLocked(value);
      return;
    }
    const dirty = this.dirtyLocked();
    if (!read.amended) {
      this.read = { m: read.m, amended: true };
    }
    dirty.set(key, newEntry(value));
  }

  /**
   * Returns the existing value for the key if present. Otherwise it stores
   * and returns the given value. `loaded` is true if the value was loaded.
   */
  loadOrStore(
    ...[key, value]: [unknown, unknown]
  ): [actual: unknown, loaded: boolean] {
    const read = this.read;
    const e = read.m.get(key);
    if (e !== undefined) {
      if (e.unexpungeLocked()) {
        this.dirtyLocked().set(key, e);
      }
      const [actual, loaded] = e.tryLoadOrStore(value);
      return [actual, loaded];
    }
    const d = this.dirty?.get(key);
    if (d !== undefined) {
      const [actual, loaded] = d.tryLoadOrStore(value);
      this.missLocked();
      return [actual, loaded];
    }
    const dirty = this.dirtyLocked();
    if (!read.amended) {
      this.read = { m: read.m, amended: true };
    }
    dirty.set(key, newEntry(value));
    return [value, false];
  }

  /**
   * Deletes the value for a key.
   */
  delete(key: unknown): void {
    const read = this.read;
    const e = read.m.get(key);
    if (e === undefined) {
      if (read.amended) {
        this.dirty?.delete(key);
      }
      return;
    }
    e.delete();
  }

  /**
   * Calls `f` for each key and value present in the map, stopping when `f`
   * returns false. Each key is visited at most once; stores made during the
   * walk may or may not be observed.
   */
  range(f: (...[key, value]: [unknown, unknown]) => boolean): void {
    let read = this.read;
    if (read.amended) {
      read = { m: this.dirtyLocked(), amended: false };
      this.read = read;
      this.dirty = undefined;
      this.misses = 0;
    }
    for (const [k, e] of read.m) {
      const [v, ok] = e.load();
      if (!ok) {
        continue;
      }
      if (!f(k, v)) {
        break;
      }
    }
  }

  private missLocked(): void {
    this.misses++;
    if (this.dirty === undefined || this.misses < this.dirty.size) {
      return;
    }
    this.read = { m: this.dirty, amended: false };
    this.dirty = undefined;
    this.misses = 0;
  }

  private dirtyLocked(): Map<unknown, Entry> {
    if (this.dirty !== undefined) {
      return this.dirty;
    }
    const dirty = new Map<unknown, Entry>();
    for (const [k, e] of this.read.m) {
      if (!e.tryExpungeLocked()) {
        dirty.set(k, e);
      }
    }
    this.dirty = dirty;
    return dirty;
  }
}

/**
 * A slot in the map. `p` is undefined once the entry is deleted, and
 * `expunged` once it is deleted and dropped from the dirty map.
 */
class Entry {
  p: { readonly value: unknown } | typeof expunged | undefined;

  constructor(p: { readonly value: unknown } | undefined) {
    this.p = p;
  }

  load(): [value: unknown, ok: boolean] {
    const p = this.p;
    if (p === undefined || p === expunged) {
      return [undefined, false];
    }
    return [p.value, true];
  }

  /**
   * Stores a value if the entry has not been expunged.
   */
  tryStore(value: unknown): boolean {
    if (this.p === expunged) {
      return false;
    }
    this.p = { value };
    return true;
  }

  /**
   * Ensures the entry is not marked as expunged. Returns true if it was, in
   * which case the entry must be added to the dirty map.
   */
  unexpungeLocked(): boolean {
    if (this.p !== expunged) {
      return false;
    }
    this.p = undefined;
    return true;
  }

  storeLocked(value: unknown): void {
    this.p = { value };
  }

  /**
   * Loads the existing value, or stores `value` when the entry is empty.
   * `ok` is false when the entry is expunged.
   */
  tryLoadOrStore(
    value: unknown
  ): [actual: unknown, loaded: boolean, ok: boolean] {
    const p = this.p;
    if (p === expunged) {
      return [undefined, false, false];
    }
    if (p !== undefined) {
      return [p.value, true, true];
    }
    this.p = { value };
    return [value, false, true];
  }

  delete(): boolean {
    const p = this.p;
    if (p === undefined || p === expunged) {
      return false;
    }
    this.p = undefined;
    return true;
  }

  tryExpungeLocked(): boolean {
    if (this.p === undefined) {
      this.p = expunged;
    }
    return this.p === expunged;
  }
}

function newEntry(value: unknown): Entry {
  return new Entry({ value });
}
