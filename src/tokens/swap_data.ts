import { getAddress, isAddress } from 'ethers';
import { componentLogger } from '../modules/logger';
import { routerInterface } from './abi';
import type { Address, HexString } from './types';

const logger = componentLogger('swap-data');

/**
 * Swap intents recognised in observed calls.
 */
export enum SwapType {
  Deposit = 'deposit',
  Buy = 'buy',
  Withdraw = 'withdraw',
  Sell = 'sell',
}

function selectorOf(name: string): string {
  const fragment = routerInterface.getFunction(name);
  if (!fragment) throw new Error(`router ABI lacks ${name}`);
  return fragment.selector;
}

export const SWAP_SELECTORS: Readonly<Record<SwapType, string>> = {
  [SwapType.Deposit]: selectorOf('deposit'),
  [SwapType.Withdraw]: selectorOf('withdraw'),
  [SwapType.Buy]: selectorOf('swapExactETHForTokensSupportingFeeOnTransferTokens'),
  [SwapType.Sell]: selectorOf('swapExactTokensForETHSupportingFeeOnTransferTokens'),
};

// Position of the `address[] path` argument
const PATH_ARGUMENT: Partial<Record<SwapType, number>> = {
  [SwapType.Buy]: 1,
  [SwapType.Sell]: 2,
};

/**
 * A call as handed over by the ABI decoder: 4-byte selector plus positional arguments.
 */
export interface DecodedCall {
  selector: HexString;
  args: readonly unknown[];
}

/** Protocol-agnostic shape consumed by the corpus layer */
export interface GenericSwapInfo {
  ty: string;
  target: string;
  path: string[];
}

function swapTypeOf(selector: HexString): SwapType | undefined {
  const normalized = selector.toLowerCase();
  return Object.values(SwapType).find((ty) => SWAP_SELECTORS[ty] === normalized);
}

function extractPath(args: readonly unknown[], idx: number): string[] | undefined {
  const raw = args[idx];
  if (!Array.isArray(raw)) return undefined;
  const path: string[] = [];
  for (const item of raw) {
    if (typeof item !== 'string' || !isAddress(item)) return undefined;
    path.push(getAddress(item));
  }
  return path;
}

export class SwapInfo {
  readonly ty: SwapType;
  /** Checksummed target address */
  readonly target: string;
  path: string[];

  constructor(ty: SwapType, target: string, path: string[]) {
    this.ty = ty;
    this.target = target;
    this.path = path;
  }

  /**
   * Classifies a call by selector. Unknown selectors and calls whose path argument is
   * missing or malformed are not swaps.
   */
  static tryNew(target: Address, call: DecodedCall): SwapInfo | undefined {
    const ty = swapTypeOf(call.selector);
    if (ty === undefined) return undefined;

    const pathIdx = PATH_ARGUMENT[ty];
    const path = pathIdx === undefined ? [] : extractPath(call.args, pathIdx);
    if (!path) return undefined;

    return new SwapInfo(ty, getAddress(target), path);
  }

  /**
   * Merges another observation of the same swap: the path is cut at the last
   * element equal to `newPath[0]` and `newPath` is appended. Without such an
   * element the two are simply concatenated.
   */
  concatPath(newPath: readonly string[]): void {
    if (newPath.length === 0) return;

    let idx = this.path.length;
    for (let i = this.path.length - 1; i >= 0; i--) {
      if (this.path[i] === newPath[0]) {
        idx = i;
        break;
      }
    }
    this.path.splice(idx);
    this.path.push(...newPath);
  }

  toGeneric(): GenericSwapInfo {
    return { ty: this.ty, target: this.target, path: [...this.path] };
  }
}

/**
 * Swap observations for one target, at most one SwapInfo per SwapType.
 */
export class SwapData {
  private readonly inner = new Map<SwapType, SwapInfo>();

  /**
   * Records a decoded call; observations of an already known type are merged into it.
   * Returns the stored entry, or undefined when the call is not a swap.
   */
  push(target: Address, call: DecodedCall): SwapInfo | undefined {
    const info = SwapInfo.tryNew(target, call);
    if (!info) return undefined;

    const existing = this.inner.get(info.ty);
    if (existing) {
      existing.concatPath(info.path);
      return existing;
    }
    this.inner.set(info.ty, info);
    return info;
  }

  /**
   * Decodes raw calldata against the router ABI and pushes it.
   * Returns whether the call was recognised as a swap.
   */
  record(target: Address, calldata: HexString): boolean {
    let call: DecodedCall;
    try {
      const tx = routerInterface.parseTransaction({ data: calldata });
      if (!tx) return false;
      call = { selector: tx.selector, args: [...tx.args] };
    } catch (err) {
      logger.debug({ target, err: err instanceof Error ? err.message : String(err) }, '[swap-data] undecodable call ignored');
      return false;
    }
    return this.push(target, call) !== undefined;
  }

  get(ty: SwapType): SwapInfo | undefined {
    return this.inner.get(ty);
  }

  get size(): number {
    return this.inner.size;
  }

  toGeneric(): Record<string, GenericSwapInfo> {
    const out: Record<string, GenericSwapInfo> = {};
    for (const [ty, info] of this.inner) {
      out[ty] = info.toGeneric();
    }
    return out;
  }

  toJSON(): Record<string, GenericSwapInfo> {
    return this.toGeneric();
  }
}
