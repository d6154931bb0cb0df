/**
 * Ordered rule tables evaluated top to bottom. Rule order is the tie-break
 * policy, so tables must be kept in their declared order.
 */

export type ClassificationRule<C, R> = {
  when: (ctx: C) => boolean;
  result: R;
};

export type DeltaRule<C> = {
  id: string;
  when: (ctx: C) => boolean;
  delta: number;
};

export type AppliedDelta = {
  id: string | null;
  delta: number;
};

export function classify<C, R>(rules: ReadonlyArray<ClassificationRule<C, R>>, ctx: C, fallback: R): R {
  for (const rule of rules) {
    if (rule.when(ctx)) return rule.result;
  }
  return fallback;
}

/**
 * Delta of the first matching rule, or 0 when nothing matches.
 */
export function firstDelta<C>(rules: ReadonlyArray<DeltaRule<C>>, ctx: C): AppliedDelta {
  for (const rule of rules) {
    if (rule.when(ctx)) return { id: rule.id, delta: rule.delta };
  }
  return { id: null, delta: 0 };
}

/**
 * Descending lower-bound bands: the first band whose floor the value reaches wins.
 */
export function band<R>(value: number, bands: ReadonlyArray<readonly [number, R]>, fallback: R): R {
  return classify(
    bands.map(([floor, result]) => ({ when: (v: number) => v >= floor, result })),
    value,
    fallback
  );
}
