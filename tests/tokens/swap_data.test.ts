import { expect } from 'chai';
import { getAddress } from 'ethers';
import { routerInterface } from '../../src/tokens/abi';
import { SWAP_SELECTORS, SwapData, SwapInfo, SwapType } from '../../src/tokens/swap_data';

const TARGET = '0x7a250d5630b4cf539739df2c5dacb4c659f2488d';
const WETH = '0x3000000000000000000000000000000000000003';
const TOKEN = '0x1000000000000000000000000000000000000001';
const MID = '0x2000000000000000000000000000000000000002';
const USER = '0x00000000000000000000000000000000000000c4';

function buyCall(path: string[]): string {
  return routerInterface.encodeFunctionData('swapExactETHForTokensSupportingFeeOnTransferTokens', [0n, path, USER, 1n]);
}

function sellCall(path: string[]): string {
  return routerInterface.encodeFunctionData('swapExactTokensForETHSupportingFeeOnTransferTokens', [
    100n,
    0n,
    path,
    USER,
    1n,
  ]);
}

describe('SwapInfo.concatPath', () => {
  function info(path: string[]): SwapInfo {
    return new SwapInfo(SwapType.Buy, getAddress(TARGET), path);
  }

  it('continues a path whose last element starts the new one', () => {
    const s = info(['A', 'B']);
    s.concatPath(['B', 'C']);
    expect(s.path).to.deep.equal(['A', 'B', 'C']);
  });

  it('concatenates paths without overlap', () => {
    const s = info(['A', 'B']);
    s.concatPath(['X', 'Y']);
    expect(s.path).to.deep.equal(['A', 'B', 'X', 'Y']);
  });

  it('is idempotent for a fully overlapping path', () => {
    const s = info(['A', 'B', 'C']);
    s.concatPath(['A', 'B', 'C']);
    const once = [...s.path];
    s.concatPath(['A', 'B', 'C']);
    expect(once).to.deep.equal(['A', 'B', 'C']);
    expect(s.path).to.deep.equal(once);
  });

  it('cuts at the last occurrence of the new first element', () => {
    const s = info(['A', 'B', 'A', 'C']);
    s.concatPath(['A', 'D']);
    expect(s.path).to.deep.equal(['A', 'B', 'A', 'D']);
  });

  it('leaves the path alone for an empty observation', () => {
    const s = info(['A', 'B']);
    s.concatPath([]);
    expect(s.path).to.deep.equal(['A', 'B']);
  });
});

describe('SwapData', () => {
  it('uses the router selectors', () => {
    expect(SWAP_SELECTORS).to.deep.equal({
      deposit: '0xd0e30db0',
      withdraw: '0x2e1a7d4d',
      buy: '0xb6f9de95',
      sell: '0x791ac947',
    });
  });

  it('records a buy path in checksummed form', () => {
    const data = new SwapData();
    expect(data.record(TARGET, buyCall([WETH, TOKEN]))).to.equal(true);

    const buy = data.get(SwapType.Buy);
    expect(buy?.target).to.equal(getAddress(TARGET));
    expect(buy?.path).to.deep.equal([getAddress(WETH), getAddress(TOKEN)]);
  });

  it('reads the sell path from the third argument', () => {
    const data = new SwapData();
    data.record(TARGET, sellCall([TOKEN, WETH]));
    expect(data.get(SwapType.Sell)?.path).to.deep.equal([getAddress(TOKEN), getAddress(WETH)]);
  });

  it('merges observations of the same type into one entry', () => {
    const data = new SwapData();
    data.record(TARGET, buyCall([WETH, MID]));
    data.record(TARGET, buyCall([MID, TOKEN]));

    expect(data.size).to.equal(1);
    expect(data.get(SwapType.Buy)?.path).to.deep.equal([getAddress(WETH), getAddress(MID), getAddress(TOKEN)]);
  });

  it('keeps deposit and withdraw with empty paths', () => {
    const data = new SwapData();
    data.record(TARGET, routerInterface.encodeFunctionData('deposit'));
    data.record(TARGET, routerInterface.encodeFunctionData('withdraw', [5n]));
    data.record(TARGET, routerInterface.encodeFunctionData('deposit'));

    expect(data.toGeneric()).to.deep.equal({
      deposit: { ty: 'deposit', target: getAddress(TARGET), path: [] },
      withdraw: { ty: 'withdraw', target: getAddress(TARGET), path: [] },
    });
  });

  it('ignores unknown selectors and undecodable calldata', () => {
    const data = new SwapData();
    expect(data.record(TARGET, '0xdeadbeef')).to.equal(false);
    expect(data.record(TARGET, SWAP_SELECTORS[SwapType.Buy] + '00')).to.equal(false);
    expect(data.size).to.equal(0);
  });

  it('discards decoded calls whose path argument is malformed', () => {
    const data = new SwapData();
    expect(data.push(TARGET, { selector: SWAP_SELECTORS[SwapType.Buy], args: [0n] })).to.equal(undefined);
    expect(data.push(TARGET, { selector: SWAP_SELECTORS[SwapType.Buy], args: [0n, 'not-a-path'] })).to.equal(undefined);
    expect(data.push(TARGET, { selector: SWAP_SELECTORS[SwapType.Sell], args: [1n, 0n, [WETH, 42]] })).to.equal(undefined);
    expect(data.size).to.equal(0);
  });

  it('accepts decoded calls handed over directly', () => {
    const data = new SwapData();
    const stored = data.push(TARGET, { selector: '0xB6F9DE95', args: [0n, [WETH, TOKEN]] });
    expect(stored?.ty).to.equal(SwapType.Buy);
    expect(stored?.path).to.deep.equal([getAddress(WETH), getAddress(TOKEN)]);
  });

  it('serialises to the generic shape', () => {
    const data = new SwapData();
    data.record(TARGET, sellCall([TOKEN, WETH]));
    expect(JSON.parse(JSON.stringify(data))).to.deep.equal({
      sell: { ty: 'sell', target: getAddress(TARGET), path: [getAddress(TOKEN), getAddress(WETH)] },
    });
  });
});
