import { parseAbi } from 'viem';

/** Liquity v1 StabilityPool */
export const STABILITY_POOL_ABI = parseAbi([
  'function provideToSP(uint256 _amount, address _frontEndTag)',
  'function withdrawFromSP(uint256 _amount)',
  'function getCompoundedLUSDDeposit(address _depositor) view returns (uint256)',
  'function getDepositorLQTYGain(address _depositor) view returns (uint256)',
  'function getDepositorETHGain(address _depositor) view returns (uint256)',
]);
