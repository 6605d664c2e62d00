export * from './types';
export * from './errors';
export * from './abi';
export * from './pair_context';
export * from './uniswap_info';
export * from './uniswap_pair';
export * from './weth_pair';
export * from './token_context';
export * from './swap_data';
