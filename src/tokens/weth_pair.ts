import { getAddress } from 'ethers';
import { componentLogger } from '../modules/logger';
import { wethInterface } from './abi';
import type { PairContext } from './pair_context';
import { sameAddress, type Address, type ExecutionContext, type HopResult } from './types';

const logger = componentLogger('weth');

/**
 * Wrap/unwrap pseudo-pool over the wrapped native asset.
 * Buy direction deposits native currency, sell direction withdraws it back to `src`.
 */
export class WethContext implements PairContext {
  readonly wethAddress: Address;

  constructor(wethAddress: Address) {
    this.wethAddress = getAddress(wethAddress);
  }

  name(): string {
    return `Weth(${this.wethAddress})`;
  }

  transform(
    src: Address,
    next: Address,
    amount: bigint,
    ctx: ExecutionContext,
    reverse: boolean
  ): HopResult | undefined {
    const snapshot = ctx.checkpoint();
    const result = reverse ? this.deposit(src, next, amount, ctx) : this.withdraw(src, amount, ctx);
    if (result) {
      ctx.commit(snapshot);
    } else {
      ctx.revertTo(snapshot);
    }
    return result;
  }

  private deposit(src: Address, next: Address, amount: bigint, ctx: ExecutionContext): HopResult | undefined {
    const wrapped = ctx.call({
      caller: src,
      target: this.wethAddress,
      data: wethInterface.encodeFunctionData('deposit'),
      value: amount,
    });
    if (!wrapped.success) {
      logger.debug({ src, amount: amount.toString(), reason: wrapped.reason }, '[weth] deposit failed');
      return undefined;
    }
    if (sameAddress(src, next)) return [src, amount];

    const moved = ctx.call({
      caller: src,
      target: this.wethAddress,
      data: wethInterface.encodeFunctionData('transfer', [next, amount]),
    });
    return moved.success ? [next, amount] : undefined;
  }

  private withdraw(src: Address, amount: bigint, ctx: ExecutionContext): HopResult | undefined {
    const unwrapped = ctx.call({
      caller: src,
      target: this.wethAddress,
      data: wethInterface.encodeFunctionData('withdraw', [amount]),
    });
    if (!unwrapped.success) {
      logger.debug({ src, amount: amount.toString(), reason: unwrapped.reason }, '[weth] withdraw failed');
      return undefined;
    }
    return [src, amount];
  }
}
