import type {
  Address,
  HarvestReport,
  Holdings,
  LiquidationResult,
  RouteSelector,
} from '@sluice/types';
import { AccountingModule } from './accounting.js';
import { ConversionPipeline } from './conversion/pipeline.js';
import type { RouteContext } from './conversion/route.js';
import { CycleInProgressError, external } from './errors.js';
import { LiquidationPlanner } from './liquidation-planner.js';
import { OperatorSet } from './operator.js';
import { applyLossNetting, redeployAmount } from './policies.js';
import { ValuationOracle } from './valuation.js';
import { YieldVenueAdapter } from './venue.js';
import type {
  EngineEvent,
  EngineEventCallback,
  StrategyEngineConfig,
  StrategyEngineDeps,
} from './types.js';
import { DEFAULT_ENGINE_CONFIG } from './types.js';

/** Settings that only change through the operator surface */
type OperatorManagedKey = 'routeSelector' | 'operators';

/** Collaborators rebuilt whenever the configuration changes */
interface EngineComponents {
  valuation: ValuationOracle;
  venue: YieldVenueAdapter;
  accounting: AccountingModule;
  planner: LiquidationPlanner;
  pipeline: ConversionPipeline;
}

/**
 * Strategy Engine
 *
 * Root of the harvest/rebalance state machine. The upstream framework calls
 * the entry points below; each one runs to completion or is rolled back to
 * the checkpoint taken before it started.
 *
 * Harvest (prepareReturn):
 * 1. Read totalDebt from the framework
 * 2. Claim venue rewards and convert them to the base asset
 * 3. Value idle base + recoverable principal
 * 4. profit = max(0, value - totalDebt), loss = max(0, totalDebt - value)
 * 5. Liquidate debtOutstanding + profit; debtPayment = min(debtOutstanding, freed)
 * 6. Fold any liquidation loss in according to the loss-netting policy
 *
 * Only one entry point runs at a time. The route selector is read once when a
 * cycle starts, so an operator change made mid-cycle applies to the next one.
 */
export class StrategyEngine {
  private config: StrategyEngineConfig;
  private readonly deps: StrategyEngineDeps;
  private readonly clock: () => number;
  private readonly operators: OperatorSet;
  private routeSelector: RouteSelector;

  private components: EngineComponents;

  /** Entry point currently running, if any */
  private running: string | null = null;
  /** Events held back until the running entry point commits */
  private pendingEvents: EngineEvent[] | null = null;
  private eventCallback?: EngineEventCallback;
  private lastReport: HarvestReport | null = null;

  constructor(deps: StrategyEngineDeps, config: Partial<StrategyEngineConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.clock = deps.clock ?? Date.now;
    this.operators = new OperatorSet(this.config.operators);
    this.routeSelector = this.config.routeSelector;
    this.components = this.buildComponents();
  }

  /**
   * Set a callback to receive engine events.
   * Events raised inside an entry point are delivered only once it commits.
   */
  onEvent(callback: EngineEventCallback): void {
    this.eventCallback = callback;
  }

  // ==========================================================================
  // Upstream framework entry points
  // ==========================================================================

  /**
   * Run one harvest cycle and report to the framework.
   *
   * @param debtOutstanding - base asset the framework wants back this cycle
   */
  async prepareReturn(debtOutstanding: bigint): Promise<HarvestReport> {
    const selector = this.routeSelector;
    return this.atomically('prepareReturn', async () => {
      const { framework, self } = this.deps;

      const totalDebt = await external('framework', 'totalDebt', () => framework.totalDebt(self));

      const pipeline = await this.components.pipeline.claimAndConvert(selector, (receipt) =>
        this.emit({ type: 'conversion_executed', receipt }),
      );

      const postValue = await this.components.accounting.postConversionValue();
      const claimPhase = {
        profit: postValue > totalDebt ? postValue - totalDebt : 0n,
        loss: totalDebt > postValue ? totalDebt - postValue : 0n,
      };

      const liquidation = await this.components.planner.liquidate(debtOutstanding + claimPhase.profit);
      const debtPayment = debtOutstanding < liquidation.liquidated ? debtOutstanding : liquidation.liquidated;

      const { profit, loss } = applyLossNetting(this.config.lossNetting, claimPhase, liquidation.loss);
      const report: HarvestReport = { profit, loss, debtPayment };

      this.emit({ type: 'harvest_reported', report, totalDebt, pipeline });
      this.lastReport = report;
      return report;
    });
  }

  /**
   * Deploy idle base asset into the venue according to the redeploy policy.
   * Returns the amount deposited.
   */
  async adjustPosition(debtOutstanding: bigint): Promise<bigint> {
    return this.atomically('adjustPosition', async () => {
      const idle = await this.idleBase();
      const amount = redeployAmount(this.config.redeploy, idle, debtOutstanding);
      if (amount === 0n) return 0n;

      await this.components.venue.deposit(amount);
      this.emit({ type: 'position_adjusted', deposited: amount });
      return amount;
    });
  }

  /** Free `amountNeeded` of base asset, reporting any shortfall as loss */
  async liquidatePosition(amountNeeded: bigint): Promise<LiquidationResult> {
    return this.atomically('liquidatePosition', async () => {
      const result = await this.components.planner.liquidate(amountNeeded);
      this.emit({ type: 'liquidated', requested: amountNeeded, result });
      return result;
    });
  }

  /** Attempt a full exit; returns the base asset freed */
  async liquidateAllPositions(): Promise<bigint> {
    return this.atomically('liquidateAllPositions', async () => {
      const target = await this.components.accounting.estimatedTotalAssets();
      const result = await this.components.planner.liquidate(target);
      this.emit({ type: 'liquidated', requested: target, result });
      return result.liquidated;
    });
  }

  /**
   * Withdraw all principal from the venue so the framework can sweep the
   * base asset to `successor`. Does not claim or convert rewards.
   * Returns the amount withdrawn.
   */
  async prepareMigration(successor: Address): Promise<bigint> {
    return this.atomically('prepareMigration', async () => {
      const recoverable = await this.components.venue.recoverableBalance();
      if (recoverable === 0n) return 0n;

      const withdrawn = await this.components.venue.withdraw(recoverable);
      this.emit({ type: 'migrated', successor, withdrawn });
      return withdrawn;
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  estimatedTotalAssets(): Promise<bigint> {
    return this.components.accounting.estimatedTotalAssets();
  }

  holdings(): Promise<Holdings> {
    return this.components.accounting.holdings();
  }

  /** Base-asset value of a native-currency amount, for external reporting */
  ethToWant(amount: bigint): Promise<bigint> {
    return this.components.valuation.nativeToBase(amount);
  }

  name(): string {
    return this.config.name;
  }

  /** Assets a generic sweep of the engine's account must not move */
  protectedAssets(): Address[] {
    const { rewardA, bridge, secondary } = this.deps.assets;
    return [rewardA.address, bridge.address, secondary.address];
  }

  getRouteSelector(): RouteSelector {
    return this.routeSelector;
  }

  isOperator(address: Address): boolean {
    return this.operators.has(address);
  }

  /** Whether an entry point is currently running */
  isBusy(): boolean {
    return this.running !== null;
  }

  getLastReport(): HarvestReport | null {
    return this.lastReport;
  }

  getConfig(): StrategyEngineConfig {
    return { ...this.config, routeSelector: this.routeSelector };
  }

  /**
   * Update engine configuration. Not allowed while an entry point runs.
   * The route selector and operator set only change through the operator surface.
   */
  updateConfig(updates: Partial<Omit<StrategyEngineConfig, OperatorManagedKey>>): void {
    if (this.running) {
      throw new CycleInProgressError(this.running, 'updateConfig');
    }
    this.config = { ...this.config, ...updates };
    this.components = this.buildComponents();
  }

  // ==========================================================================
  // Operator surface
  // ==========================================================================

  /** Choose the final-hop venue. Applies from the next cycle. */
  setRouteSelector(caller: Address, selector: RouteSelector): void {
    this.operators.authorize(caller, 'change the route selector');
    const from = this.routeSelector;
    if (from === selector) return;

    this.routeSelector = selector;
    this.dispatch({ type: 'route_changed', from, to: selector, by: caller });
  }

  /** Deposit into the venue outside the harvest cycle */
  async forceDeposit(caller: Address, amount: bigint): Promise<void> {
    this.operators.authorize(caller, 'force a deposit');
    await this.atomically('forceDeposit', async () => {
      await this.components.venue.deposit(amount);
      this.emit({ type: 'position_adjusted', deposited: amount });
    });
  }

  /** Withdraw from the venue outside the harvest cycle; returns the amount received */
  async forceWithdraw(caller: Address, amount: bigint): Promise<bigint> {
    this.operators.authorize(caller, 'force a withdrawal');
    return this.atomically('forceWithdraw', async () => {
      const received = await this.components.venue.withdraw(amount);
      this.emit({ type: 'force_withdrawn', requested: amount, received });
      return received;
    });
  }

  /** Send the whole native-currency balance to `to`; returns the amount sent */
  async sweepNative(caller: Address, to: Address): Promise<bigint> {
    this.operators.authorize(caller, 'sweep native currency');
    return this.atomically('sweepNative', async () => {
      const { ledger, self } = this.deps;
      const amount = await external('ledger', 'nativeBalanceOf', () => ledger.nativeBalanceOf(self));
      if (amount === 0n) return 0n;

      await external('ledger', 'transferNative', () => ledger.transferNative(to, amount));
      this.emit({ type: 'native_swept', to, amount });
      return amount;
    });
  }

  // ---- Private ----

  private buildComponents(): EngineComponents {
    const { self, assets, ledger, venue, router, pool, nativeOracle, rewardAOracle } = this.deps;
    const config = this.config;

    const valuation = new ValuationOracle(nativeOracle, config.maxPriceAgeSeconds, this.clock);
    if (rewardAOracle) {
      valuation.addFeed(assets.rewardA.address, rewardAOracle, `${assets.rewardA.symbol} price feed`);
    }

    const venueAdapter = new YieldVenueAdapter(venue, ledger, self, assets.base.address, config.referrer);

    const routeContext: RouteContext = {
      self,
      ledger,
      router,
      pool,
      deadline: () => BigInt(Math.floor(this.clock() / 1000) + config.swapDeadlineSeconds),
    };

    return {
      valuation,
      venue: venueAdapter,
      accounting: new AccountingModule(self, assets, ledger, venueAdapter, valuation, {
        nativeReserve: config.nativeReserve,
        quoteSecondary: (amount) =>
          external('pool', 'get_dy', () => pool.getDy(config.routes.poolSecondaryIndex, config.routes.poolBaseIndex, amount)),
      }),
      planner: new LiquidationPlanner(self, assets.base.address, ledger, venueAdapter),
      pipeline: new ConversionPipeline(routeContext, assets, venueAdapter, {
        routes: config.routes,
        poolSlippageBps: config.poolSlippageBps,
        routerMinOutBps: config.routerMinOutBps,
        claimWithdrawAmount: config.claimWithdrawAmount,
        nativeReserve: config.nativeReserve,
      }),
    };
  }

  /**
   * Run an entry point all-or-nothing: refuse to overlap another one, take a
   * checkpoint, and revert to it if any step throws.
   */
  private async atomically<T>(entryPoint: string, step: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new CycleInProgressError(this.running, entryPoint);
    }
    this.running = entryPoint;
    this.pendingEvents = [];

    try {
      const { checkpointer } = this.deps;
      const checkpoint = await external('checkpoint', 'snapshot', () => checkpointer.snapshot());

      let result: T;
      try {
        result = await step();
      } catch (err) {
        this.pendingEvents = null;
        try {
          await external('checkpoint', 'revert', () => checkpointer.revert(checkpoint));
        } catch (revertErr) {
          const reason = revertErr instanceof Error ? revertErr.message : String(revertErr);
          console.error(`[ENGINE] ${entryPoint} could not revert to checkpoint ${checkpoint}: ${reason}`);
        }

        const message = err instanceof Error ? err.message : String(err);
        console.error(`[ENGINE] ${entryPoint} rolled back: ${message}`);
        this.dispatch({ type: 'rolled_back', entryPoint, error: message });
        throw err;
      }

      const events = this.pendingEvents ?? [];
      this.pendingEvents = null;
      for (const event of events) {
        this.dispatch(event);
      }
      return result;
    } finally {
      this.running = null;
      this.pendingEvents = null;
    }
  }

  /** Queue an event for delivery when the running entry point commits */
  private emit(event: EngineEvent): void {
    if (this.pendingEvents) {
      this.pendingEvents.push(event);
      return;
    }
    this.dispatch(event);
  }

  private dispatch(event: EngineEvent): void {
    if (!this.eventCallback) return;
    try {
      this.eventCallback(event);
    } catch (err) {
      console.warn('Event handler error:', err);
    }
  }

  private idleBase(): Promise<bigint> {
    const { ledger, self, assets } = this.deps;
    return external('ledger', 'balanceOf(base)', () => ledger.balanceOf(assets.base.address, self));
  }
}
