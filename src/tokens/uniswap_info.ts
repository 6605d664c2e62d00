import { getAddress, getCreate2Address, keccak256, solidityPacked } from 'ethers';
import { z } from 'zod';
import { loadConfig, type Chain } from '../config';
import providerTable from './uniswap_providers.json';
import type { Address } from './types';

/**
 * AMM deployments the route model knows how to address.
 */
export enum UniswapProvider {
  PancakeSwap = 'pancakeswap',
  SushiSwap = 'sushiswap',
  UniswapV2 = 'uniswapv2',
  UniswapV3 = 'uniswapv3',
  Biswap = 'biswap',
}

/**
 * Static protocol parameters shared by every pair of one deployment
 */
export interface UniswapInfo {
  /** Swap fee in basis points (30 = 0.3%) */
  poolFee: number;
  router: Address;
  factory: Address;
  /** keccak256 of the pair creation code, used for CREATE2 address derivation */
  initCodeHash: string;
}

const infoSchema = z.object({
  poolFee: z.number().int().min(0).max(10_000),
  router: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
  factory: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
  initCodeHash: z.string().regex(/^0x[0-9a-fA-F]{64}$/),
});

const tableSchema = z.record(z.string(), z.record(z.string(), infoSchema));

const PROVIDERS = tableSchema.parse(providerTable);

const PROVIDER_ALIASES: Record<string, UniswapProvider> = {
  pancakeswap: UniswapProvider.PancakeSwap,
  pancakeswapv2: UniswapProvider.PancakeSwap,
  sushiswap: UniswapProvider.SushiSwap,
  uniswapv2: UniswapProvider.UniswapV2,
  uniswapv3: UniswapProvider.UniswapV3,
  biswap: UniswapProvider.Biswap,
};

export function parseUniswapProvider(name: string): UniswapProvider {
  const provider = PROVIDER_ALIASES[name];
  if (provider === undefined) {
    throw new Error(`Unknown uniswap provider: ${name}`);
  }
  return provider;
}

export function getUniswapInfo(provider: UniswapProvider, chain: Chain): UniswapInfo {
  const info = PROVIDERS[chain]?.[provider];
  if (!info) {
    throw new Error(`Uniswap provider ${provider} @ chain ${chain} not supported`);
  }
  return {
    poolFee: info.poolFee,
    router: getAddress(info.router),
    factory: getAddress(info.factory),
    initCodeHash: info.initCodeHash,
  };
}

/**
 * Protocol parameters for the CHAIN / UNISWAP_PROVIDER pair in the loaded config.
 */
export function defaultUniswapInfo(): UniswapInfo {
  const cfg = loadConfig();
  return getUniswapInfo(parseUniswapProvider(cfg.UNISWAP_PROVIDER), cfg.CHAIN);
}

/**
 * CREATE2 address of the pair holding `tokenA` and `tokenB` under the deployment's factory.
 */
export function computePairAddress(info: UniswapInfo, tokenA: Address, tokenB: Address): Address {
  const [token0, token1] = sortTokens(tokenA, tokenB);
  const salt = keccak256(solidityPacked(['address', 'address'], [token0, token1]));
  return getCreate2Address(info.factory, salt, info.initCodeHash);
}

export function sortTokens(tokenA: Address, tokenB: Address): readonly [Address, Address] {
  const a = getAddress(tokenA);
  const b = getAddress(tokenB);
  return a.toLowerCase() < b.toLowerCase() ? [a, b] : [b, a];
}
