import type { LossNettingPolicy, RedeployPolicy } from '@sluice/types';

/** Profit and loss after liquidation has been accounted for */
export interface ProfitAndLoss {
  profit: bigint;
  loss: bigint;
}

/**
 * Combine the claim-phase profit/loss with a loss realised while liquidating.
 *
 * The result never has both figures nonzero.
 */
export function applyLossNetting(
  policy: LossNettingPolicy,
  claimPhase: ProfitAndLoss,
  liquidationLoss: bigint,
): ProfitAndLoss {
  const { profit, loss } = claimPhase;
  if (liquidationLoss === 0n) {
    return { profit, loss };
  }

  if (policy === 'net') {
    if (profit >= liquidationLoss) {
      return { profit: profit - liquidationLoss, loss };
    }
    return { profit: 0n, loss: loss + (liquidationLoss - profit) };
  }

  // separate: the liquidation loss is reported in full; unrealised profit is dropped
  return { profit: 0n, loss: loss + liquidationLoss };
}

/** Base asset `adjustPosition` deposits under a redeploy policy */
export function redeployAmount(policy: RedeployPolicy, idle: bigint, debtOutstanding: bigint): bigint {
  if (policy === 'deposit-all') return idle;
  return idle > debtOutstanding ? idle - debtOutstanding : 0n;
}
