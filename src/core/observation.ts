import type { IndexSet } from "./indexSet";

/**
 * Kind of change announced around a mutation.
 * `setting` is a property assigned on its object and carries no indexes.
 */
export type ChangeKind = "insertion" | "removal" | "replacement" | "setting";

/**
 * Receiver of will-change / did-change pairs.
 * `property` is the list's (or assigned property's) name on its owner object.
 */
export interface ListObserver {
  willChange?(property: string, kind: ChangeKind, indexes: IndexSet): void;
  didChange?(property: string, kind: ChangeKind, indexes: IndexSet): void;
}

/** Identity of an observed list: owner object id plus property name. */
export type ObservationKey = {
  ownerId: string;
  property: string;
};

/** Cancellable registration returned by `addObserver(...)`. */
export interface NotificationToken {
  /** Stop delivery. Safe to call more than once. */
  cancel(): void;
  readonly cancelled: boolean;
}

type Bracket = {
  kind: ChangeKind;
  indexes: IndexSet;
  participants: ListObserver[];
};

/** Handle for an open will-change / did-change pair. Closing twice is a no-op. */
export type ChangeBracket = {
  close(): void;
};

function keyOf(key: ObservationKey): string {
  return `${key.ownerId}\u0000${key.property}`;
}

/**
 * Observers of one list property.
 * A bracket delivers did-change to exactly the observers that saw will-change,
 * and cancellations made while a bracket is open apply once it closes.
 */
export class ObservationInfo {
  private _observers: ListObserver[] = [];
  private _open: Bracket[] = [];
  private _pendingCancels: Set<ListObserver> = new Set();

  constructor(
    readonly key: ObservationKey,
    private readonly _registry: ObservationRegistry,
  ) {}

  get observerCount(): number {
    return this._observers.length;
  }

  get inFlight(): boolean {
    return this._open.length > 0;
  }

  add(observer: ListObserver): NotificationToken {
    this._observers.push(observer);
    let cancelled = false;
    return {
      cancel: () => {
        if (cancelled) return;
        cancelled = true;
        this._remove(observer);
      },
      get cancelled() {
        return cancelled;
      },
    };
  }

  /**
   * Announce will-change and return the bracket whose `close()` announces did-change.
   * If a `willChange` throws, the observers notified before it get their did-change here.
   */
  open(kind: ChangeKind, indexes: IndexSet): ChangeBracket {
    const bracket: Bracket = {
      kind,
      indexes,
      participants: [...this._observers],
    };
    this._trace("willChange", kind, indexes);
    this._open.push(bracket);
    let closed = false;
    const notified: ListObserver[] = [];
    try {
      for (const observer of bracket.participants) {
        observer.willChange?.(this.key.property, kind, indexes);
        notified.push(observer);
      }
    } catch (error) {
      bracket.participants = notified;
      this._deliverDidChange(bracket);
      throw error;
    }
    return {
      close: () => {
        if (closed) return;
        closed = true;
        this._deliverDidChange(bracket);
      },
    };
  }

  private _deliverDidChange(bracket: Bracket): void {
    this._trace("didChange", bracket.kind, bracket.indexes);
    try {
      for (const observer of bracket.participants) {
        observer.didChange?.(this.key.property, bracket.kind, bracket.indexes);
      }
    } finally {
      this._finish(bracket);
    }
  }

  private _finish(bracket: Bracket): void {
    this._open = this._open.filter((open) => open !== bracket);
    if (this._open.length === 0 && this._pendingCancels.size > 0) {
      const pending = this._pendingCancels;
      this._pendingCancels = new Set();
      for (const observer of pending) {
        this._remove(observer);
      }
    }
  }

  private _remove(observer: ListObserver): void {
    if (this._open.length > 0) {
      this._pendingCancels.add(observer);
      return;
    }
    const index = this._observers.indexOf(observer);
    if (index !== -1) {
      this._observers.splice(index, 1);
    }
    if (this._observers.length === 0) {
      this._registry.release(this);
    }
  }

  private _trace(phase: string, kind: ChangeKind, indexes: IndexSet): void {
    if (this._registry.trace) {
      console.debug(
        `[tabula] ${phase} ${this.key.ownerId}.${this.key.property} ${kind} ${indexes.toString()}`,
      );
    }
  }
}

/**
 * Session-owned lookup of observation infos.
 * Lists hold an `ObservationKey`, never the info itself.
 */
export class ObservationRegistry {
  private _infos: Map<string, ObservationInfo> = new Map();

  constructor(public trace = false) {}

  /** The info for `key` when at least one observer is registered. */
  lookup(key: ObservationKey): ObservationInfo | undefined {
    const info = this._infos.get(keyOf(key));
    return info && info.observerCount > 0 ? info : undefined;
  }

  /** Return the info for `key`, creating it on first attach. */
  ensure(key: ObservationKey): ObservationInfo {
    const id = keyOf(key);
    let info = this._infos.get(id);
    if (!info) {
      info = new ObservationInfo({ ...key }, this);
      this._infos.set(id, info);
    }
    return info;
  }

  /** @internal */
  release(info: ObservationInfo): void {
    const id = keyOf(info.key);
    if (this._infos.get(id) === info) {
      this._infos.delete(id);
    }
  }

  /** Drop every info owned by `ownerId` (owner object deleted). */
  releaseOwner(ownerId: string): void {
    for (const [id, info] of this._infos) {
      if (info.key.ownerId === ownerId && !info.inFlight) {
        this._infos.delete(id);
      }
    }
  }

  clear(): void {
    this._infos.clear();
  }

  get size(): number {
    return this._infos.size;
  }
}
