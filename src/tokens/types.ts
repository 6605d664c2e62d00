/**
 * Shapes shared by the route model, the single-hop transforms and the execution layer.
 */

/** 0x-prefixed 20-byte address, any casing */
export type Address = string;

/** 0x-prefixed hex payload */
export type HexString = string;

/**
 * One call against the execution layer: `caller` sends `data` (ABI calldata) and
 * `value` wei of native currency to `target`.
 */
export interface CallRequest {
  caller: Address;
  target: Address;
  data: HexString;
  value?: bigint;
}

export interface CallResult {
  success: boolean;
  /** ABI-encoded return data, '0x' when the call returns nothing or failed */
  output: HexString;
  /** Revert reason, when the executor knows one */
  reason?: string;
}

/**
 * Handle on the contract-execution VM for one fuzzing worker.
 *
 * `call` is atomic: a failing call leaves no trace in the state. Multi-call hops
 * bracket their calls with `checkpoint` and either `commit` or `revertTo`.
 */
export interface ExecutionContext {
  call(request: CallRequest): CallResult;
  staticCall(request: CallRequest): CallResult;
  checkpoint(): number;
  revertTo(id: number): void;
  commit(id: number): void;
  /** Picks an address out of the fuzzer's caller pool */
  randomCaller(): Address;
}

/** Receiver of a hop's output and the amount it actually received */
export type HopResult = readonly [receiver: Address, amountOut: bigint];

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
