import { expect } from 'chai';
import { getAddress } from 'ethers';
import { SimulatedChain } from '../../src/sim/chain';
import { uniswapHop, wethHop } from '../../src/tokens/pair_context';
import { TokenContext, TokenContextBuilder } from '../../src/tokens/token_context';
import { getUniswapInfo, UniswapProvider } from '../../src/tokens/uniswap_info';
import { UniswapPairContext } from '../../src/tokens/uniswap_pair';
import { WethContext } from '../../src/tokens/weth_pair';

const TOKEN = '0x1000000000000000000000000000000000000001';
const MID = '0x2000000000000000000000000000000000000002';
const WETH = '0x3000000000000000000000000000000000000003';
const POOL_A = '0x00000000000000000000000000000000000000a1';
const POOL_B = '0x00000000000000000000000000000000000000b2';
const BUYER = '0x00000000000000000000000000000000000000c4';
const CALLER = '0x00000000000000000000000000000000000000c5';

describe('Route scenarios on the simulated chain', () => {
  const info = getUniswapInfo(UniswapProvider.UniswapV2, 'eth');
  let chain: SimulatedChain;

  beforeEach(() => {
    chain = new SimulatedChain({ callers: [CALLER] });
    chain.deployToken(TOKEN);
    chain.deployToken(MID);
    chain.deployWeth(WETH);
  });

  describe('token -> mid -> weth -> native', () => {
    let token: TokenContext;

    beforeEach(() => {
      chain.deployPair(POOL_A, TOKEN, MID, info.poolFee);
      chain.addLiquidity(POOL_A, TOKEN, 1_000_000n, 2_000_000n);
      chain.deployPair(POOL_B, MID, WETH, info.poolFee);
      chain.addLiquidity(POOL_B, MID, 2_000_000n, 1_000_000n);

      const poolA = new UniswapPairContext({ pairAddress: POOL_A, tokenIn: TOKEN, tokenOut: MID, side: 0, uniswapInfo: info });
      const poolB = new UniswapPairContext({ pairAddress: POOL_B, tokenIn: MID, tokenOut: WETH, side: 0, uniswapInfo: info });
      token = new TokenContextBuilder(WETH)
        .addRoute([uniswapHop(poolA), uniswapHop(poolB), wethHop(new WethContext(WETH))])
        .build();
    });

    it('buys with borrowed native currency through both pools', () => {
      const receipt = token.buy(1000n, BUYER, chain, [0]);

      expect(receipt?.hops.map((h) => h.amountOut)).to.deep.equal([1000n, 1992n, 992n]);
      expect(receipt?.amountOut).to.equal(992n);
      expect(chain.balanceOf(TOKEN, BUYER)).to.equal(992n);
      expect(chain.flashloan.owed).to.equal(1000n);
      expect(chain.getReserves(POOL_B)).to.deep.equal([1_998_008n, 1_001_000n]);
      expect(chain.getReserves(POOL_A)).to.deep.equal([999_008n, 2_001_992n]);
    });

    it('sells the bought tokens back for less native currency', () => {
      const bought = token.buy(1000n, BUYER, chain, [0]);
      expect(bought).to.not.equal(undefined);

      const sold = token.sell(992n, BUYER, chain, [0]);

      expect(sold?.hops.map((h) => h.amountOut)).to.deep.equal([1980n, 988n, 988n]);
      expect(sold?.amountOut).to.equal(988n);
      expect(chain.nativeBalanceOf(CALLER)).to.equal(988n);
      expect(chain.flashloan).to.deep.equal({ owed: 1000n, earned: 988n });
      expect(chain.balanceOf(TOKEN, BUYER)).to.equal(0n);
    });

    it('reports an infeasible sell when the seller holds nothing', () => {
      expect(token.sell(500n, BUYER, chain, [0])).to.equal(undefined);
      expect(chain.getReserves(POOL_A)).to.deep.equal([1_000_000n, 2_000_000n]);
    });
  });

  it('round-trips a single hop without gaining value', () => {
    const pool = '0x00000000000000000000000000000000000000d1';
    chain.deployPair(pool, TOKEN, WETH, info.poolFee);
    chain.addLiquidity(pool, TOKEN, 1_000_000n, 1_000_000n);
    chain.mint(WETH, BUYER, 1000n);
    const hop = new UniswapPairContext({ pairAddress: pool, tokenIn: TOKEN, tokenOut: WETH, side: 0, uniswapInfo: info });
    const token = new TokenContextBuilder(WETH).addRoute([uniswapHop(hop)]).build();

    const bought = token.buy(1000n, BUYER, chain, [0]);
    expect(bought?.amountOut).to.equal(996n);

    const sold = token.sell(996n, BUYER, chain, [0]);
    expect(sold?.amountOut).to.equal(994n);
    expect(sold?.hops[0].receiver).to.equal('0x0000000000000000000000000000000000000000');
  });

  it('wraps and unwraps the native token directly', () => {
    const token = TokenContext.forWeth(new WethContext(WETH), WETH);
    chain.setNativeBalance(BUYER, 400n);

    expect(token.buy(400n, BUYER, chain, [0])?.amountOut).to.equal(400n);
    expect(chain.balanceOf(WETH, BUYER)).to.equal(400n);

    expect(token.sell(150n, BUYER, chain, [0])?.amountOut).to.equal(150n);
    expect(chain.nativeBalanceOf(BUYER)).to.equal(150n);
    expect(token.isWeth).to.equal(true);
    expect(token.wethAddress).to.equal(getAddress(WETH));
  });
});
