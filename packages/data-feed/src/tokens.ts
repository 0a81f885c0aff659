import type { Address, ChainName, StrategyAssets } from '@sluice/types';

/** Contract addresses of one Liquity-style deployment and its conversion venues */
export interface VenueDeployment {
  assets: StrategyAssets;
  stabilityPool: Address;
  /** Liquity PriceFeed (lastGoodPrice) */
  priceFeed: Address;
  /** Uniswap v3 SwapRouter */
  swapRouter: Address;
  /** Curve LUSD/3CRV metapool; DAI is underlying coin 1 */
  curvePool: Address;
}

const MAINNET_ASSETS: StrategyAssets = {
  base: {
    symbol: 'LUSD',
    name: 'LUSD Stablecoin',
    address: '0x5f98805A4E8be255a32880FDeC7F6728C6568bA0',
    decimals: 18,
  },
  rewardA: {
    symbol: 'LQTY',
    name: 'LQTY',
    address: '0x6DEA81C8171D0bA574754EF6F8b412F2Ed88c54D',
    decimals: 18,
  },
  bridge: {
    symbol: 'WETH',
    name: 'Wrapped Ether',
    address: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
    decimals: 18,
  },
  secondary: {
    symbol: 'DAI',
    name: 'Dai Stablecoin',
    address: '0x6B175474E89094C44Da98b954EedeAC495271d0F',
    decimals: 18,
  },
};

const MAINNET_DEPLOYMENT: VenueDeployment = {
  assets: MAINNET_ASSETS,
  stabilityPool: '0x66017D22b0f8556afDd19FC67041899Eb65a21bb',
  priceFeed: '0x4c517D4e2C851CA76d7eC94B805269Df0f2201De',
  swapRouter: '0xE592427A0AEce92De3Edee1F18E0157C05861564',
  curvePool: '0xEd279fDD11cA84bEef15AF5D39BB4d4bEE23F0cA',
};

/** Known deployments per chain; anvil is assumed to fork mainnet */
const DEPLOYMENTS: Record<ChainName, VenueDeployment> = {
  mainnet: MAINNET_DEPLOYMENT,
  anvil: MAINNET_DEPLOYMENT,
};

/**
 * Get the venue deployment for a chain.
 */
export function getDeployment(chain: ChainName): VenueDeployment {
  return DEPLOYMENTS[chain];
}
