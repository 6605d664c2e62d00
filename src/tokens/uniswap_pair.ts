import Decimal from 'decimal.js';
import { getAddress } from 'ethers';
import { componentLogger } from '../modules/logger';
import { erc20Interface, pairInterface, readBalance, readReserves } from './abi';
import type { AmmPairContext } from './pair_context';
import type { UniswapInfo } from './uniswap_info';
import { sameAddress, type Address, type ExecutionContext, type HopResult } from './types';

const logger = componentLogger('pair');

// Configure decimal.js for high precision
Decimal.config({
  precision: 50,
  rounding: Decimal.ROUND_DOWN,
});

const FEE_DENOMINATOR = 10_000n;

/**
 * Constant-product output for `amountIn`, fee in basis points.
 * Zero input or an empty reserve yields zero.
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  const amountInWithFee = amountIn * (FEE_DENOMINATOR - BigInt(feeBps));
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * FEE_DENOMINATOR + amountInWithFee;
  return numerator / denominator;
}

export interface UniswapPairOptions {
  pairAddress: Address;
  /** Token on the target side of the hop */
  tokenIn: Address;
  /** Token on the native side of the hop */
  tokenOut: Address;
  /** 0 when `tokenIn` is the pair's token0 */
  side: 0 | 1;
  uniswapInfo: UniswapInfo;
  /** Reserves seen at discovery time, [reserve0, reserve1] */
  initialReserves?: readonly [bigint, bigint];
}

/**
 * UniswapV2-style pair hop. Supports fee-on-transfer tokens by measuring what
 * actually arrived in the pool and at the receiver instead of trusting quotes.
 */
export class UniswapPairContext implements AmmPairContext {
  readonly pairAddress: Address;
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly side: 0 | 1;
  readonly uniswapInfo: UniswapInfo;
  readonly initialReserves: readonly [bigint, bigint];

  constructor(opts: UniswapPairOptions) {
    this.pairAddress = getAddress(opts.pairAddress);
    this.tokenIn = getAddress(opts.tokenIn);
    this.tokenOut = getAddress(opts.tokenOut);
    this.side = opts.side;
    this.uniswapInfo = opts.uniswapInfo;
    this.initialReserves = opts.initialReserves ?? [0n, 0n];
  }

  name(): string {
    return `Uniswap(${this.pairAddress})`;
  }

  /**
   * Price of `tokenIn` in `tokenOut` from the discovery-time reserves. Diagnostic only.
   */
  spotPrice(): Decimal {
    const [r0, r1] = this.initialReserves;
    const [reserveIn, reserveOut] = this.side === 0 ? [r0, r1] : [r1, r0];
    if (reserveIn === 0n) return new Decimal(0);
    return new Decimal(reserveOut.toString()).div(reserveIn.toString());
  }

  initialTransfer(src: Address, dst: Address, amount: bigint, ctx: ExecutionContext): boolean {
    const res = ctx.call({
      caller: src,
      target: this.tokenIn,
      data: erc20Interface.encodeFunctionData('transfer', [dst, amount]),
    });
    if (!res.success) {
      logger.debug({ pair: this.pairAddress, src, reason: res.reason }, '[pair] initial transfer failed');
    }
    return res.success;
  }

  transform(
    src: Address,
    next: Address,
    amount: bigint,
    ctx: ExecutionContext,
    reverse: boolean
  ): HopResult | undefined {
    const snapshot = ctx.checkpoint();
    const result = this.swap(src, next, amount, ctx, reverse);
    if (result) {
      ctx.commit(snapshot);
    } else {
      ctx.revertTo(snapshot);
    }
    return result;
  }

  private swap(
    src: Address,
    next: Address,
    amount: bigint,
    ctx: ExecutionContext,
    reverse: boolean
  ): HopResult | undefined {
    const [inputToken, outputToken] = reverse ? [this.tokenOut, this.tokenIn] : [this.tokenIn, this.tokenOut];
    const inputIsToken0 = reverse ? this.side === 1 : this.side === 0;

    const reserves = readReserves(ctx, this.pairAddress);
    if (!reserves) return undefined;
    const [reserveIn, reserveOut] = inputIsToken0 ? reserves : [reserves[1], reserves[0]];

    // Buys pull from the sender unless the previous hop already pushed into this pool
    if (reverse && !sameAddress(src, this.pairAddress)) {
      const pulled = ctx.call({
        caller: src,
        target: inputToken,
        data: erc20Interface.encodeFunctionData('transfer', [this.pairAddress, amount]),
      });
      if (!pulled.success) return undefined;
    }

    const pairBalance = readBalance(ctx, inputToken, this.pairAddress);
    if (pairBalance === undefined || pairBalance <= reserveIn) return undefined;
    const amountIn = pairBalance - reserveIn;

    const amountOut = getAmountOut(amountIn, reserveIn, reserveOut, this.uniswapInfo.poolFee);
    if (amountOut === 0n) return undefined;

    const before = readBalance(ctx, outputToken, next);
    if (before === undefined) return undefined;

    const [amount0Out, amount1Out] = inputIsToken0 ? [0n, amountOut] : [amountOut, 0n];
    const swapped = ctx.call({
      caller: src,
      target: this.pairAddress,
      data: pairInterface.encodeFunctionData('swap', [amount0Out, amount1Out, next, '0x']),
    });
    if (!swapped.success) return undefined;

    const after = readBalance(ctx, outputToken, next);
    if (after === undefined || after <= before) return undefined;
    return [next, after - before];
  }
}
