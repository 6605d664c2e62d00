import { Interface } from 'ethers';
import type { ExecutionContext, Address } from './types';

export const ERC20_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
];

export const WETH_ABI = [...ERC20_ABI, 'function deposit() payable', 'function withdraw(uint256 wad)'];

export const PAIR_ABI = [
  'function token0() view returns (address)',
  'function token1() view returns (address)',
  'function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
  'function swap(uint256 amount0Out, uint256 amount1Out, address to, bytes data)',
];

// Calls observed in traffic that reveal a token's trade route
export const ROUTER_ABI = [
  'function swapExactETHForTokensSupportingFeeOnTransferTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable',
  'function swapExactTokensForETHSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)',
  'function deposit() payable',
  'function withdraw(uint256 wad)',
];

export const erc20Interface = new Interface(ERC20_ABI);
export const wethInterface = new Interface(WETH_ABI);
export const pairInterface = new Interface(PAIR_ABI);
export const routerInterface = new Interface(ROUTER_ABI);

/**
 * Reads an ERC20 balance through the execution context.
 * Returns undefined when the call fails or does not decode to a uint.
 */
export function readBalance(ctx: ExecutionContext, token: Address, owner: Address): bigint | undefined {
  const res = ctx.staticCall({
    caller: owner,
    target: token,
    data: erc20Interface.encodeFunctionData('balanceOf', [owner]),
  });
  if (!res.success) return undefined;
  const [balance] = erc20Interface.decodeFunctionResult('balanceOf', res.output);
  return typeof balance === 'bigint' ? balance : undefined;
}

export function readReserves(ctx: ExecutionContext, pair: Address): readonly [bigint, bigint] | undefined {
  const res = ctx.staticCall({
    caller: pair,
    target: pair,
    data: pairInterface.encodeFunctionData('getReserves'),
  });
  if (!res.success) return undefined;
  const [r0, r1] = pairInterface.decodeFunctionResult('getReserves', res.output);
  if (typeof r0 !== 'bigint' || typeof r1 !== 'bigint') return undefined;
  return [r0, r1];
}
