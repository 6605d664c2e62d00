import { Interface, dataSlice, getAddress, isAddress, keccak256, toUtf8Bytes } from 'ethers';
import { componentLogger } from '../modules/logger';
import { loadConfig } from '../config';
import { pairInterface, wethInterface } from '../tokens/abi';
import type { Address, CallRequest, CallResult, ExecutionContext, HexString } from '../tokens/types';

const logger = componentLogger('sim');

const BPS = 10_000n;

interface TokenState {
  isWeth: boolean;
  /** Transfer fee in basis points, burned on every transfer */
  feeBps: number;
  balances: Map<string, bigint>;
}

interface PairState {
  token0: string;
  token1: string;
  reserve0: bigint;
  reserve1: bigint;
  feeBps: number;
}

/**
 * Native currency lent to callers that wrap more than they hold, and native
 * currency paid out by unwraps.
 */
export interface FlashloanData {
  owed: bigint;
  earned: bigint;
}

interface ChainState {
  tokens: Map<string, TokenState>;
  pairs: Map<string, PairState>;
  native: Map<string, bigint>;
  flashloan: FlashloanData;
}

export interface SimulatedChainOptions {
  /** Fuzzer caller pool; defaults to SIM_CALLER_COUNT derived addresses */
  callers?: Address[];
}

class Revert extends Error {}

function revert(reason: string): never {
  throw new Revert(reason);
}

function key(address: Address): string {
  return address.toLowerCase();
}

function uintArg(value: unknown): bigint {
  return typeof value === 'bigint' ? value : revert('bad uint argument');
}

function addressArg(value: unknown): string {
  return typeof value === 'string' && isAddress(value) ? key(value) : revert('bad address argument');
}

function parse(iface: Interface, data: HexString, value: bigint) {
  let tx: ReturnType<Interface['parseTransaction']>;
  try {
    tx = iface.parseTransaction({ data, value });
  } catch (err) {
    return revert(`invalid calldata: ${err instanceof Error ? err.message : String(err)}`);
  }
  return tx ?? revert('unknown selector');
}

export function defaultCallers(count: number): Address[] {
  return Array.from({ length: count }, (_, i) => getAddress(dataSlice(keccak256(toUtf8Bytes(`sim-caller-${i}`)), 12)));
}

/**
 * In-process execution context: ERC20 tokens (optionally fee-on-transfer), UniswapV2
 * pairs, a WETH9 contract and native balances. Calls are atomic; a reverted call
 * leaves no change behind.
 */
export class SimulatedChain implements ExecutionContext {
  private state: ChainState = {
    tokens: new Map(),
    pairs: new Map(),
    native: new Map(),
    flashloan: { owed: 0n, earned: 0n },
  };
  private readonly snapshots = new Map<number, ChainState>();
  private nextSnapshot = 0;
  private readonly callerPool: Address[];
  private callerCursor = 0;

  constructor(opts: SimulatedChainOptions = {}) {
    this.callerPool = (opts.callers ?? defaultCallers(loadConfig().SIM_CALLER_COUNT)).map((c) => getAddress(c));
  }

  // ---------------------------
  // Setup
  // ---------------------------

  deployToken(address: Address, opts: { feeBps?: number } = {}): Address {
    this.state.tokens.set(key(address), { isWeth: false, feeBps: opts.feeBps ?? 0, balances: new Map() });
    return getAddress(address);
  }

  deployWeth(address: Address): Address {
    this.state.tokens.set(key(address), { isWeth: true, feeBps: 0, balances: new Map() });
    return getAddress(address);
  }

  deployPair(address: Address, tokenA: Address, tokenB: Address, feeBps: number): Address {
    for (const token of [tokenA, tokenB]) {
      if (!this.state.tokens.has(key(token))) throw new Error(`token ${token} not deployed`);
    }
    const [token0, token1] = key(tokenA) < key(tokenB) ? [key(tokenA), key(tokenB)] : [key(tokenB), key(tokenA)];
    this.state.pairs.set(key(address), { token0, token1, reserve0: 0n, reserve1: 0n, feeBps });
    return getAddress(address);
  }

  /**
   * Credits the pair with `amountA` of `tokenA` and `amountB` of the other token and syncs reserves.
   */
  addLiquidity(pairAddress: Address, tokenA: Address, amountA: bigint, amountB: bigint): void {
    const pair = this.pairState(this.state, key(pairAddress));
    const [amount0, amount1] = key(tokenA) === pair.token0 ? [amountA, amountB] : [amountB, amountA];
    this.mint(pair.token0, pairAddress, amount0);
    this.mint(pair.token1, pairAddress, amount1);
    pair.reserve0 += amount0;
    pair.reserve1 += amount1;
  }

  mint(token: Address, account: Address, amount: bigint): void {
    this.credit(this.tokenState(this.state, key(token)), key(account), amount);
  }

  setNativeBalance(account: Address, amount: bigint): void {
    this.state.native.set(key(account), amount);
  }

  addCaller(address: Address): void {
    this.callerPool.push(getAddress(address));
  }

  // ---------------------------
  // Views
  // ---------------------------

  balanceOf(token: Address, account: Address): bigint {
    return this.tokenState(this.state, key(token)).balances.get(key(account)) ?? 0n;
  }

  nativeBalanceOf(account: Address): bigint {
    return this.state.native.get(key(account)) ?? 0n;
  }

  getReserves(pairAddress: Address): readonly [bigint, bigint] {
    const pair = this.pairState(this.state, key(pairAddress));
    return [pair.reserve0, pair.reserve1];
  }

  get flashloan(): FlashloanData {
    return { ...this.state.flashloan };
  }

  get callers(): readonly Address[] {
    return [...this.callerPool];
  }

  // ---------------------------
  // ExecutionContext
  // ---------------------------

  call(request: CallRequest): CallResult {
    const draft = structuredClone(this.state);
    const result = this.run(draft, request);
    if (result.success) {
      this.state = draft;
    }
    return result;
  }

  staticCall(request: CallRequest): CallResult {
    return this.run(structuredClone(this.state), request);
  }

  checkpoint(): number {
    const id = this.nextSnapshot++;
    this.snapshots.set(id, structuredClone(this.state));
    return id;
  }

  revertTo(id: number): void {
    const snapshot = this.snapshots.get(id);
    if (!snapshot) throw new Error(`unknown checkpoint ${id}`);
    this.state = snapshot;
    // later checkpoints describe states that no longer exist
    for (const other of [...this.snapshots.keys()]) {
      if (other >= id) this.snapshots.delete(other);
    }
  }

  commit(id: number): void {
    if (!this.snapshots.delete(id)) throw new Error(`unknown checkpoint ${id}`);
  }

  randomCaller(): Address {
    if (this.callerPool.length === 0) throw new Error('caller pool is empty');
    const caller = this.callerPool[this.callerCursor % this.callerPool.length];
    this.callerCursor++;
    return caller;
  }

  // ---------------------------
  // Execution
  // ---------------------------

  private run(state: ChainState, request: CallRequest): CallResult {
    try {
      return { success: true, output: this.execute(state, request) };
    } catch (err) {
      if (!(err instanceof Revert)) throw err;
      logger.trace({ target: request.target, caller: request.caller, reason: err.message }, '[sim] call reverted');
      return { success: false, output: '0x', reason: err.message };
    }
  }

  private execute(state: ChainState, request: CallRequest): HexString {
    const target = key(request.target);
    const caller = key(request.caller);
    const value = request.value ?? 0n;

    const pair = state.pairs.get(target);
    if (pair) {
      if (value > 0n) revert('non-payable');
      const tx = parse(pairInterface, request.data, value);
      switch (tx.name) {
        case 'token0':
          return pairInterface.encodeFunctionResult('token0', [pair.token0]);
        case 'token1':
          return pairInterface.encodeFunctionResult('token1', [pair.token1]);
        case 'getReserves':
          return pairInterface.encodeFunctionResult('getReserves', [pair.reserve0, pair.reserve1, 0]);
        case 'swap':
          this.swap(state, target, pair, uintArg(tx.args[0]), uintArg(tx.args[1]), addressArg(tx.args[2]));
          return '0x';
        default:
          return revert(`unsupported pair call ${tx.name}`);
      }
    }

    const token = state.tokens.get(target);
    if (token) {
      const tx = parse(wethInterface, request.data, value);
      if (tx.name !== 'deposit' && value > 0n) revert('non-payable');
      switch (tx.name) {
        case 'balanceOf':
          return wethInterface.encodeFunctionResult('balanceOf', [token.balances.get(addressArg(tx.args[0])) ?? 0n]);
        case 'transfer':
          this.transfer(token, caller, addressArg(tx.args[0]), uintArg(tx.args[1]));
          return wethInterface.encodeFunctionResult('transfer', [true]);
        case 'deposit':
          if (!token.isWeth) revert('unsupported token call deposit');
          this.deposit(state, token, caller, value);
          return '0x';
        case 'withdraw':
          if (!token.isWeth) revert('unsupported token call withdraw');
          this.withdraw(state, token, caller, uintArg(tx.args[0]));
          return '0x';
        default:
          return revert(`unsupported token call ${tx.name}`);
      }
    }

    return revert('no contract at target');
  }

  private transfer(token: TokenState, from: string, to: string, amount: bigint): void {
    const balance = token.balances.get(from) ?? 0n;
    if (balance < amount) revert('transfer amount exceeds balance');
    token.balances.set(from, balance - amount);
    const fee = (amount * BigInt(token.feeBps)) / BPS;
    this.credit(token, to, amount - fee);
  }

  private swap(state: ChainState, self: string, pair: PairState, amount0Out: bigint, amount1Out: bigint, to: string): void {
    if (amount0Out === 0n && amount1Out === 0n) revert('INSUFFICIENT_OUTPUT_AMOUNT');
    if (amount0Out >= pair.reserve0 || amount1Out >= pair.reserve1) revert('INSUFFICIENT_LIQUIDITY');
    if (to === pair.token0 || to === pair.token1) revert('INVALID_TO');

    const token0 = this.tokenState(state, pair.token0);
    const token1 = this.tokenState(state, pair.token1);
    if (amount0Out > 0n) this.transfer(token0, self, to, amount0Out);
    if (amount1Out > 0n) this.transfer(token1, self, to, amount1Out);

    const balance0 = token0.balances.get(self) ?? 0n;
    const balance1 = token1.balances.get(self) ?? 0n;
    const amount0In = balance0 > pair.reserve0 - amount0Out ? balance0 - (pair.reserve0 - amount0Out) : 0n;
    const amount1In = balance1 > pair.reserve1 - amount1Out ? balance1 - (pair.reserve1 - amount1Out) : 0n;
    if (amount0In === 0n && amount1In === 0n) revert('INSUFFICIENT_INPUT_AMOUNT');

    const fee = BigInt(pair.feeBps);
    const adjusted0 = balance0 * BPS - amount0In * fee;
    const adjusted1 = balance1 * BPS - amount1In * fee;
    if (adjusted0 * adjusted1 < pair.reserve0 * pair.reserve1 * BPS * BPS) revert('K');

    pair.reserve0 = balance0;
    pair.reserve1 = balance1;
  }

  private deposit(state: ChainState, weth: TokenState, caller: string, value: bigint): void {
    const held = state.native.get(caller) ?? 0n;
    if (held < value) {
      state.flashloan.owed += value - held;
    }
    state.native.set(caller, held < value ? 0n : held - value);
    this.credit(weth, caller, value);
  }

  private withdraw(state: ChainState, weth: TokenState, caller: string, amount: bigint): void {
    const balance = weth.balances.get(caller) ?? 0n;
    if (balance < amount) revert('withdraw amount exceeds balance');
    weth.balances.set(caller, balance - amount);
    state.native.set(caller, (state.native.get(caller) ?? 0n) + amount);
    state.flashloan.earned += amount;
  }

  private credit(token: TokenState, account: string, amount: bigint): void {
    token.balances.set(account, (token.balances.get(account) ?? 0n) + amount);
  }

  private tokenState(state: ChainState, address: string): TokenState {
    const token = state.tokens.get(address);
    if (!token) throw new Error(`token ${address} not deployed`);
    return token;
  }

  private pairState(state: ChainState, address: string): PairState {
    const pair = state.pairs.get(address);
    if (!pair) throw new Error(`pair ${address} not deployed`);
    return pair;
  }
}
