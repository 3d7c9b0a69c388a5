import { translateError, translateErrors } from "./errors";
import { IndexSet } from "./indexSet";
import type {
  ChangeKind,
  ObservationKey,
  ObservationRegistry,
} from "./observation";

/** What the coordinator needs from an observable list. */
export type ChangeTarget = {
  readonly registry: ObservationRegistry;
  readonly observationKey: ObservationKey;
};

/**
 * Run `mutate` inside a will-change / did-change bracket.
 * `indexes` is evaluated once, before the mutation, and only when someone observes.
 * did-change fires on every exit path; failures are re-thrown translated.
 */
export function changeList<T>(
  target: ChangeTarget,
  kind: ChangeKind,
  mutate: () => T,
  indexes: () => IndexSet,
): T {
  const info = target.registry.lookup(target.observationKey);
  if (!info) {
    return translateErrors(mutate);
  }
  const bracket = translateErrors(() => info.open(kind, indexes()));
  try {
    return mutate();
  } catch (error) {
    throw translateError(error);
  } finally {
    bracket.close();
  }
}

export function changeAt<T>(
  target: ChangeTarget,
  kind: ChangeKind,
  index: number,
  mutate: () => T,
): T {
  return changeList(target, kind, mutate, () => IndexSet.of(index));
}

/** Bracket over `[start, start + length)`. */
export function changeRange<T>(
  target: ChangeTarget,
  kind: ChangeKind,
  start: number,
  length: number,
  mutate: () => T,
): T {
  return changeList(target, kind, mutate, () => IndexSet.range(start, length));
}

export function changeSet<T>(
  target: ChangeTarget,
  kind: ChangeKind,
  indexes: IndexSet,
  mutate: () => T,
): T {
  return changeList(target, kind, mutate, () => indexes);
}
