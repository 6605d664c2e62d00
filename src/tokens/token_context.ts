import { ZeroAddress, getAddress } from 'ethers';
import { componentLogger } from '../modules/logger';
import { metrics, type SwapDirection } from '../modules/metrics';
import { RouteInvariantError } from './errors';
import type { PairContext, PairHandle } from './pair_context';
import type { Address, ExecutionContext } from './types';

const logger = componentLogger('route');

/**
 * One route from the target token to the native asset: indexes into the owning
 * TokenContext's pair arena, first hop on the token side.
 */
export interface PathContext {
  readonly route: readonly number[];
}

export interface HopTrace {
  pair: string;
  receiver: Address;
  amountOut: bigint;
}

export interface SwapReceipt {
  direction: SwapDirection;
  routeIndex: number;
  amountIn: bigint;
  /** What the last hop delivered */
  amountOut: bigint;
  hops: HopTrace[];
}

/** Fuzzer-controlled entropy; only the first byte is consulted */
export type Seed = Uint8Array | readonly number[];

/**
 * Every known route for one token plus the wrapped-native special case.
 * Built once at discovery time and only read afterwards.
 */
export class TokenContext {
  readonly pairs: readonly PairHandle[];
  readonly swaps: readonly PathContext[];
  readonly isWeth: boolean;
  readonly wethAddress: Address;

  constructor(pairs: readonly PairHandle[], swaps: readonly PathContext[], isWeth: boolean, wethAddress: Address) {
    for (const path of swaps) {
      if (path.route.length === 0) {
        throw new RouteInvariantError('EMPTY_ROUTE', 'route without hops');
      }
      for (const idx of path.route) {
        if (!Number.isInteger(idx) || idx < 0 || idx >= pairs.length) {
          throw new RouteInvariantError('EMPTY_ROUTE', `route references missing pair #${idx}`);
        }
      }
    }
    this.pairs = pairs;
    this.swaps = swaps;
    this.isWeth = isWeth;
    this.wethAddress = getAddress(wethAddress);
  }

  /**
   * Context for the wrapped native token itself: a single route made of the wrap hop.
   */
  static forWeth(weth: PairContext, wethAddress: Address): TokenContext {
    return new TokenContext([{ kind: 'weth', ctx: weth }], [{ route: [0] }], true, wethAddress);
  }

  /**
   * Index of the route a seed selects, or undefined when there is none.
   */
  selectRoute(seed: Seed): number | undefined {
    if (this.swaps.length === 0) return undefined;
    return (seed[0] ?? 0) % this.swaps.length;
  }

  routeHops(routeIndex: number): PairHandle[] {
    return this.swaps[routeIndex].route.map((idx) => this.pairs[idx]);
  }

  describe(): string[] {
    return this.swaps.map((path) => path.route.map((idx) => this.pairs[idx].ctx.name()).join(' -> '));
  }

  /**
   * Buys the token with `amountIn` of native currency, delivering to `to`.
   * Hops run from the native side back to the token side.
   * Returns undefined when the trade is infeasible.
   */
  buy(amountIn: bigint, to: Address, ctx: ExecutionContext, seed: Seed): SwapReceipt | undefined {
    if (this.isWeth) {
      return this.wrapOnly('buy', amountIn, to, to, ctx);
    }

    const routeIndex = this.selectRoute(seed);
    if (routeIndex === undefined) {
      metrics.recordAttempt('buy', 0);
      metrics.recordOutcome('buy', 'no_route');
      return undefined;
    }
    const hops = this.routeHops(routeIndex);
    const pathLen = hops.length;
    metrics.recordAttempt('buy', pathLen);

    const trace: HopTrace[] = [];
    let currentAmountIn = amountIn;
    let currentSender: Address | undefined;

    for (let nth = 0; nth < pathLen; nth++) {
      const pair = hops[pathLen - 1 - nth];
      const isFinal = nth === pathLen - 1;
      const next = isFinal ? to : this.poolAddress(hops[pathLen - nth - 2]);

      if (pair.kind === 'uniswap') {
        const sender = currentSender ?? to;
        const res = pair.ctx.transform(sender, next, currentAmountIn, ctx, true);
        metrics.recordHop('uniswap', res !== undefined);
        if (!res) {
          logger.debug(
            { pair: pair.ctx.name(), sender, next, amountIn: currentAmountIn.toString() },
            '[route] buy hop failed'
          );
          metrics.recordOutcome('buy', 'infeasible');
          return undefined;
        }
        [currentSender, currentAmountIn] = res;
        trace.push({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1] });
        logger.debug({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1].toString() }, '[route] buy hop ok');
      } else {
        if (currentSender !== undefined) {
          throw this.violation('INVALID_WETH_CONTEXT', 'wrap hop must be the native end of a buy route');
        }
        const res = pair.ctx.transform(to, to, amountIn, ctx, true);
        metrics.recordHop('weth', res !== undefined);
        if (!res) {
          throw this.violation('WRAP_FAILED', `${pair.ctx.name()} deposit failed mid-route`);
        }
        currentSender = to;
        currentAmountIn = res[1];
        trace.push({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1] });
      }
    }

    metrics.recordOutcome('buy', 'ok');
    return { direction: 'buy', routeIndex, amountIn, amountOut: currentAmountIn, hops: trace };
  }

  /**
   * Sells `amountIn` of the token held by `src` for native currency.
   * Hops run from the token side toward the native side; the first pool is funded
   * with a plain transfer before its swap.
   */
  sell(amountIn: bigint, src: Address, ctx: ExecutionContext, seed: Seed): SwapReceipt | undefined {
    if (this.isWeth) {
      return this.wrapOnly('sell', amountIn, src, ZeroAddress, ctx);
    }

    const routeIndex = this.selectRoute(seed);
    if (routeIndex === undefined) {
      metrics.recordAttempt('sell', 0);
      metrics.recordOutcome('sell', 'no_route');
      return undefined;
    }
    const hops = this.routeHops(routeIndex);
    const pathLen = hops.length;
    metrics.recordAttempt('sell', pathLen);

    const trace: HopTrace[] = [];
    let currentAmountIn = amountIn;
    let currentSender = src;

    for (let nth = 0; nth < pathLen; nth++) {
      const pair = hops[nth];
      const isFinal = nth === pathLen - 1;
      let next: Address = ZeroAddress;
      if (!isFinal) {
        const following = hops[nth + 1];
        // unwrapping pays out native currency, which must land on an EOA
        next = following.kind === 'uniswap' ? following.ctx.pairAddress : ctx.randomCaller();
      }

      if (pair.kind === 'uniswap') {
        if (nth === 0) {
          pair.ctx.initialTransfer(currentSender, pair.ctx.pairAddress, currentAmountIn, ctx);
        }
        const res = pair.ctx.transform(currentSender, next, currentAmountIn, ctx, false);
        metrics.recordHop('uniswap', res !== undefined);
        if (!res) {
          logger.debug(
            { pair: pair.ctx.name(), sender: currentSender, next, amountIn: currentAmountIn.toString() },
            '[route] sell hop failed'
          );
          metrics.recordOutcome('sell', 'infeasible');
          return undefined;
        }
        [currentSender, currentAmountIn] = res;
        trace.push({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1] });
        logger.debug({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1].toString() }, '[route] sell hop ok');
      } else {
        if (nth === 0) {
          throw this.violation('INVALID_WETH_CONTEXT', 'sell route cannot start with a wrap hop');
        }
        const res = pair.ctx.transform(currentSender, next, currentAmountIn, ctx, false);
        metrics.recordHop('weth', res !== undefined);
        if (!res) {
          throw this.violation('WRAP_FAILED', `${pair.ctx.name()} withdraw failed mid-route`);
        }
        currentAmountIn = res[1];
        trace.push({ pair: pair.ctx.name(), receiver: res[0], amountOut: res[1] });
      }
    }

    metrics.recordOutcome('sell', 'ok');
    return { direction: 'sell', routeIndex, amountIn, amountOut: currentAmountIn, hops: trace };
  }

  private wrapOnly(
    direction: SwapDirection,
    amountIn: bigint,
    src: Address,
    next: Address,
    ctx: ExecutionContext
  ): SwapReceipt | undefined {
    const first = this.swaps[0]?.route[0];
    const handle = first === undefined ? undefined : this.pairs[first];
    if (!handle || handle.kind !== 'weth') {
      throw this.violation('INVALID_WETH_CONTEXT', 'wrapped native token needs a wrap hop as its only route');
    }
    metrics.recordAttempt(direction, 1);
    const res = handle.ctx.transform(src, next, amountIn, ctx, direction === 'buy');
    metrics.recordHop('weth', res !== undefined);
    if (!res) {
      metrics.recordOutcome(direction, 'infeasible');
      return undefined;
    }
    metrics.recordOutcome(direction, 'ok');
    return {
      direction,
      routeIndex: 0,
      amountIn,
      amountOut: res[1],
      hops: [{ pair: handle.ctx.name(), receiver: res[0], amountOut: res[1] }],
    };
  }

  private poolAddress(handle: PairHandle): Address {
    if (handle.kind !== 'uniswap') {
      throw this.violation('INVALID_WETH_CONTEXT', `${handle.ctx.name()} found where a pool was expected`);
    }
    return handle.ctx.pairAddress;
  }

  private violation(code: RouteInvariantError['code'], message: string): RouteInvariantError {
    logger.error({ code, token: this.describe() }, `[route] ${message}`);
    return new RouteInvariantError(code, message);
  }
}

/**
 * Assembles a TokenContext. Pairs are stored once in the arena; a pair context that
 * shows up in several routes keeps a single slot.
 */
export class TokenContextBuilder {
  private readonly pairs: PairHandle[] = [];
  private readonly swaps: PathContext[] = [];

  constructor(private readonly wethAddress: Address) {}

  addRoute(route: readonly PairHandle[]): this {
    if (route.length === 0) {
      throw new RouteInvariantError('EMPTY_ROUTE', 'route without hops');
    }
    this.swaps.push({ route: route.map((handle) => this.slot(handle)) });
    return this;
  }

  build(): TokenContext {
    return new TokenContext([...this.pairs], [...this.swaps], false, this.wethAddress);
  }

  private slot(handle: PairHandle): number {
    const idx = this.pairs.findIndex((known) => known.kind === handle.kind && known.ctx === handle.ctx);
    if (idx !== -1) return idx;
    this.pairs.push(handle);
    return this.pairs.length - 1;
  }
}
