/**
 * @rewardstream/accrual — Transaction journal.
 *
 * Gives every public operation all-or-nothing semantics. Stores record
 * an undo step before each mutation; if the operation throws, the undo
 * steps run in reverse order and the error is rethrown.
 *
 * Rules:
 * - Nested runs join the outermost transaction
 * - Commit hooks fire only after the outermost run returns
 * - A rolled-back transaction fires no commit hooks
 * - Every commit hook runs even if an earlier one throws; the first
 *   error is rethrown once all have run
 */

type Step = () => void;

export class TransactionJournal {
  private _undo: Step[] | null = null;
  private _onCommit: Step[] = [];

  /**
   * Whether a transaction is currently open.
   */
  get active(): boolean {
    return this._undo !== null;
  }

  /**
   * Run `fn` atomically. Joins the open transaction if there is one.
   */
  run<T>(fn: () => T): T {
    if (this._undo !== null) {
      return fn();
    }

    this._undo = [];
    this._onCommit = [];

    let result: T;
    try {
      result = fn();
    } catch (err) {
      const undo = this._undo;
      this._undo = null;
      this._onCommit = [];
      for (const step of undo.reverse()) {
        step();
      }
      throw err;
    }

    const hooks = this._onCommit;
    this._undo = null;
    this._onCommit = [];
    runHooks(hooks);
    return result;
  }

  /**
   * Register the step that reverts a mutation about to happen.
   * Outside a transaction there is nothing to revert to.
   */
  record(undo: Step): void {
    this._undo?.push(undo);
  }

  /**
   * Defer `hook` until the open transaction commits.
   * Outside a transaction the hook runs immediately.
   */
  onCommit(hook: Step): void {
    if (this._undo === null) {
      hook();
      return;
    }
    this._onCommit.push(hook);
  }
}

function runHooks(hooks: readonly Step[]): void {
  const failures: unknown[] = [];
  for (const hook of hooks) {
    try {
      hook();
    } catch (err) {
      failures.push(err);
    }
  }
  if (failures.length > 0) {
    throw failures[0];
  }
}

/**
 * A Map whose mutations are reverted when the journal rolls back.
 */
export class JournaledMap<K, V extends NonNullable<unknown>> {
  private readonly _entries: Map<K, V> = new Map();
  private readonly _journal: TransactionJournal;

  constructor(journal: TransactionJournal) {
    this._journal = journal;
  }

  get(key: K): V | undefined {
    return this._entries.get(key);
  }

  has(key: K): boolean {
    return this._entries.has(key);
  }

  set(key: K, value: V): void {
    this._recordRestore(key);
    this._entries.set(key, value);
  }

  delete(key: K): boolean {
    if (!this._entries.has(key)) {
      return false;
    }
    this._recordRestore(key);
    return this._entries.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this._entries.entries();
  }

  get size(): number {
    return this._entries.size;
  }

  private _recordRestore(key: K): void {
    const previous = this._entries.get(key);
    if (previous === undefined) {
      this._journal.record(() => {
        this._entries.delete(key);
      });
    } else {
      this._journal.record(() => {
        this._entries.set(key, previous);
      });
    }
  }
}

/**
 * A single value whose assignments are reverted on rollback.
 */
export class JournaledValue<T> {
  private _value: T;
  private readonly _journal: TransactionJournal;

  constructor(journal: TransactionJournal, initial: T) {
    this._journal = journal;
    this._value = initial;
  }

  get(): T {
    return this._value;
  }

  set(value: T): void {
    const previous = this._value;
    this._journal.record(() => {
      this._value = previous;
    });
    this._value = value;
  }
}

/**
 * Join identities into a single map key.
 */
export function compositeKey(...parts: readonly string[]): string {
  return parts.join("\u001f");
}

/**
 * Split a key produced by compositeKey().
 */
export function splitKey(key: string): readonly string[] {
  return key.split("\u001f");
}
