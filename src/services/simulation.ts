// Price-shock simulation: opens a set of vaults on an isolated ledger, walks a
// price path, and has a keeper liquidate every vault that falls below the
// threshold after each move. Endpoint: POST /simulate.
import { parseUnits } from 'viem';
import { COLLATERAL, LIABILITY } from '../config/tokens';
import type { Address, SystemState } from '../domain/types';
import { logger } from '../utils/logger';
import { displayAmount, formatRatio } from '../utils/math';
import { InMemoryLiabilityToken } from './liabilityToken';
import { NativeAssetBank } from './nativeAsset';
import { StaticPriceFeed } from './priceFeed';
import { VaultLedger } from './vaultLedger';

const SIM_LEDGER_ADDRESS = '0x5100000000000000000000000000000000000001';
const FEED_DECIMALS = 8;

export type SimVaultSpec = {
  owner: Address;
  collateral: string; // human units
  debt: string; // human units
};

export type SimulationOptions = {
  vaults?: SimVaultSpec[];
  prices?: string[]; // human units; the first one is the opening price
  keeper?: { address: Address; collateral: string };
};

export type SimulationStep = {
  step: number;
  price: string;
  liquidated: Address[];
  state: SystemState;
};

export type SimulationResult = {
  steps: SimulationStep[];
  liquidations: number;
  survivors: Address[];
  keeperCollateralSeized: bigint;
};

export const DEFAULT_SIM_VAULTS: SimVaultSpec[] = [
  { owner: 'user1', collateral: '10', debt: '10000' },
  { owner: 'user2', collateral: '5', debt: '5000' },
  { owner: 'user3', collateral: '3', debt: '3000' },
];

export const DEFAULT_SIM_PRICES = ['2000', '1800', '1600', '1400', '1200', '1000', '800'];

export const DEFAULT_KEEPER = { address: 'keeper', collateral: '1000' };

export function runPriceShock(options: SimulationOptions = {}): SimulationResult {
  const specs = options.vaults ?? DEFAULT_SIM_VAULTS;
  const prices = options.prices ?? DEFAULT_SIM_PRICES;
  const keeper = options.keeper ?? DEFAULT_KEEPER;
  if (prices.length === 0) throw new Error('Simulation needs at least one price');

  const feed = StaticPriceFeed.fromHuman(prices[0], FEED_DECIMALS);
  const bank = new NativeAssetBank();
  const token = new InMemoryLiabilityToken(SIM_LEDGER_ADDRESS);
  const ledger = new VaultLedger({ address: SIM_LEDGER_ADDRESS, priceFeed: feed, token, asset: bank });

  logger.section('Simulation start');
  let totalDebt = 0n;
  for (const spec of specs) {
    const collateral = parseUnits(spec.collateral, COLLATERAL.decimals);
    const debt = parseUnits(spec.debt, LIABILITY.decimals);
    bank.fund(spec.owner, collateral);
    ledger.createVault(spec.owner);
    if (collateral > 0n) ledger.depositCollateral(spec.owner, collateral);
    if (debt > 0n) ledger.mintDebt(spec.owner, debt);
    totalDebt += debt;
  }

  // The keeper borrows enough VUSD up front to clear every vault's debt.
  const keeperCollateral = parseUnits(keeper.collateral, COLLATERAL.decimals);
  bank.fund(keeper.address, keeperCollateral);
  ledger.createVault(keeper.address);
  ledger.depositCollateral(keeper.address, keeperCollateral);
  if (totalDebt > 0n) ledger.mintDebt(keeper.address, totalDebt);
  const keeperWalletBefore = bank.balanceOf(keeper.address);

  const steps: SimulationStep[] = [{ step: 0, price: prices[0], liquidated: [], state: ledger.getSystemState() }];
  logger.info(`[Step 0] ${ledger.describeSystem()}`);

  let liquidations = 0;
  prices.forEach((price, i) => {
    feed.setHuman(price);
    const liquidated: Address[] = [];
    for (const vault of ledger.getVaults()) {
      if (vault.owner === keeper.address) continue;
      if (!ledger.isLiquidatable(vault.collateral, vault.debt)) continue;
      const res = ledger.liquidate(vault.owner, keeper.address);
      liquidated.push(res.owner);
      logger.info(
        `  keeper seized ${displayAmount(res.collateralSeized, COLLATERAL.symbol, COLLATERAL.decimals)} from ${res.owner} for ${displayAmount(res.debtRepaid, LIABILITY.symbol, LIABILITY.decimals)}`,
      );
    }
    liquidations += liquidated.length;
    const state = ledger.getSystemState();
    steps.push({ step: i + 1, price, liquidated, state });
    logger.info(`[Step ${i + 1}] price=${price} ratio=${formatRatio(state.collateralizationRatio)} liquidated=${liquidated.length}`);
  });

  const survivors = ledger
    .getVaults()
    .filter((v) => v.owner !== keeper.address && v.debt > 0n)
    .map((v) => v.owner);

  logger.section('Simulation end');
  logger.info(ledger.describeSystem());

  return {
    steps,
    liquidations,
    survivors,
    keeperCollateralSeized: bank.balanceOf(keeper.address) - keeperWalletBefore,
  };
}
