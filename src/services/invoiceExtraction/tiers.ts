/**
 * Ordered matcher strategies: each tier either yields a value or undefined,
 * and the first tier that yields wins. Later tiers are never consulted.
 */
export type Tier<TName extends string, TValue, TInput = string> = {
  name: TName;
  locate: (input: TInput) => TValue | undefined;
};

export type TierMatch<TName extends string, TValue> = {
  tier: TName;
  value: TValue;
};

export function firstMatch<TName extends string, TValue, TInput>(
  tiers: ReadonlyArray<Tier<TName, TValue, TInput>>,
  input: TInput
): TierMatch<TName, TValue> | undefined {
  for (const tier of tiers) {
    const value = tier.locate(input);
    if (value !== undefined) return { tier: tier.name, value };
  }
  return undefined;
}
