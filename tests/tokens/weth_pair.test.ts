import { expect } from 'chai';
import { ZeroAddress, getAddress } from 'ethers';
import { SimulatedChain } from '../../src/sim/chain';
import { WethContext } from '../../src/tokens/weth_pair';

const WETH = '0x3000000000000000000000000000000000000003';
const USER = '0x00000000000000000000000000000000000000c4';
const POOL = '0x00000000000000000000000000000000000000a1';

describe('WethContext', () => {
  let chain: SimulatedChain;
  let weth: WethContext;

  beforeEach(() => {
    chain = new SimulatedChain({ callers: [USER] });
    chain.deployWeth(WETH);
    weth = new WethContext(WETH);
  });

  it('deposits for the sender when source and destination match', () => {
    chain.setNativeBalance(USER, 500n);

    expect(weth.transform(USER, USER, 200n, chain, true)).to.deep.equal([USER, 200n]);
    expect(chain.balanceOf(WETH, USER)).to.equal(200n);
    expect(chain.nativeBalanceOf(USER)).to.equal(300n);
    expect(chain.flashloan.owed).to.equal(0n);
  });

  it('forwards wrapped tokens to another destination', () => {
    chain.setNativeBalance(USER, 200n);

    expect(weth.transform(USER, POOL, 200n, chain, true)).to.deep.equal([POOL, 200n]);
    expect(chain.balanceOf(WETH, USER)).to.equal(0n);
    expect(chain.balanceOf(WETH, POOL)).to.equal(200n);
  });

  it('withdraws back to the sender', () => {
    chain.mint(WETH, USER, 300n);

    expect(weth.transform(USER, ZeroAddress, 300n, chain, false)).to.deep.equal([USER, 300n]);
    expect(chain.nativeBalanceOf(USER)).to.equal(300n);
    expect(chain.flashloan.earned).to.equal(300n);
  });

  it('fails to withdraw more than the sender holds', () => {
    chain.mint(WETH, USER, 10n);

    expect(weth.transform(USER, ZeroAddress, 11n, chain, false)).to.equal(undefined);
    expect(chain.balanceOf(WETH, USER)).to.equal(10n);
  });

  it('names itself after the checksummed contract', () => {
    expect(weth.name()).to.equal(`Weth(${getAddress(WETH)})`);
  });
});
