import type { Address, ExecutionContext, HopResult } from './types';

/**
 * A single-hop transform: an AMM pool or the wrap/unwrap pseudo-pool.
 *
 * `reverse = true` moves value toward the target token (buy), `false` toward the
 * native asset (sell). Returns undefined when the underlying calls fail; in that
 * case the execution state is left as it was before the call.
 */
export interface PairContext {
  transform(
    src: Address,
    next: Address,
    amount: bigint,
    ctx: ExecutionContext,
    reverse: boolean
  ): HopResult | undefined;

  name(): string;
}

/**
 * AMM pools expect input tokens to already sit in their balance, so a sell starts
 * by pushing tokens into the first pool.
 */
export interface AmmPairContext extends PairContext {
  readonly pairAddress: Address;

  initialTransfer(src: Address, dst: Address, amount: bigint, ctx: ExecutionContext): boolean;
}

export type PairHandle =
  | { readonly kind: 'uniswap'; readonly ctx: AmmPairContext }
  | { readonly kind: 'weth'; readonly ctx: PairContext };

export function uniswapHop(ctx: AmmPairContext): PairHandle {
  return { kind: 'uniswap', ctx };
}

export function wethHop(ctx: PairContext): PairHandle {
  return { kind: 'weth', ctx };
}
