/**
 * Ordered matcher strategies. The first strategy that returns a non-null
 * result wins; later strategies are not evaluated.
 */
export interface MatchStrategy<TInput, TResult> {
  name: string;
  match(input: TInput): TResult | null;
}

export interface ChainMatch<TResult> {
  strategy: string;
  result: TResult;
}

export function runStrategyChain<TInput, TResult>(
  strategies: ReadonlyArray<MatchStrategy<TInput, TResult>>,
  input: TInput
): ChainMatch<TResult> | null {
  for (const strategy of strategies) {
    const result = strategy.match(input);
    if (result !== null) {
      return { strategy: strategy.name, result };
    }
  }
  return null;
}
