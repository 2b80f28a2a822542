/**
 * EpochState — The one mutable record both orchestrators share.
 *
 * The states orchestrator writes the epoch's work products; the
 * liquidity orchestrator consumes them. Nothing else writes here.
 *
 *   epochCounter        epochs whose states computation finished
 *   lastProcessedEpoch  epochs whose execution finished
 *
 * The system is idle, and user requests are accepted, only while both
 * phases are idle and every computed epoch has been executed.
 */

import type { AssetId, LiquidityPhase, PriceQuote, StatesPhase } from "@meridian/types";
import type { SystemStatus } from "@meridian/vault";
import { OrderBook } from "./order-book.js";
import type {
  EpochOrderBook,
  PreprocessedVault,
  ResolvedIntent,
  VaultTarget,
} from "./types.js";
import { OrchestratorError } from "./types.js";

export interface EpochStart {
  readonly startedAt: number;
  readonly transparentVaults: readonly string[];
  readonly encryptedVaults: readonly string[];
  readonly prices: ReadonlyMap<AssetId, PriceQuote>;
}

export class EpochState implements SystemStatus {
  epochCounter = 0;
  lastProcessedEpoch = 0;
  lastEpochStart = 0;

  statesPhase: StatesPhase = "idle";
  liquidityPhase: LiquidityPhase = "idle";
  statesCursor = 0;
  liquidityCursor = 0;

  transparentVaults: readonly string[] = [];
  encryptedVaults: readonly string[] = [];
  prices: ReadonlyMap<AssetId, PriceQuote> = new Map();

  readonly preprocessed = new Map<string, PreprocessedVault>();
  readonly intents = new Map<string, ResolvedIntent>();
  /** requestId → vaultId */
  readonly pendingDecryptions = new Map<string, string>();
  bufferDeductions: ReadonlyMap<string, bigint> = new Map();
  readonly targets = new Map<string, VaultTarget>();
  orderBook = new OrderBook();
  /** Sub-threshold deltas kept for the next epoch's netting */
  dustCarry: ReadonlyMap<AssetId, bigint> = new Map();
  orders: EpochOrderBook | undefined;

  isSystemIdle(): boolean {
    return this.statesPhase === "idle"
      && this.liquidityPhase === "idle"
      && this.lastProcessedEpoch === this.epochCounter;
  }

  /** The epoch being computed by the states orchestrator. */
  get computingEpoch(): number {
    return this.epochCounter + 1;
  }

  /** Every vault in the current epoch, transparent first. */
  epochVaults(): readonly string[] {
    return [...this.transparentVaults, ...this.encryptedVaults];
  }

  beginEpoch(start: EpochStart): void {
    this.lastEpochStart = start.startedAt;
    this.transparentVaults = start.transparentVaults;
    this.encryptedVaults = start.encryptedVaults;
    this.prices = start.prices;
    this.preprocessed.clear();
    this.intents.clear();
    this.pendingDecryptions.clear();
    this.bufferDeductions = new Map();
    this.targets.clear();
    this.orderBook = new OrderBook();
    this.statesCursor = 0;
  }

  requirePreprocessed(vaultId: string): PreprocessedVault {
    const entry = this.preprocessed.get(vaultId);
    if (entry === undefined) {
      throw new OrchestratorError("INVARIANT_VIOLATION", `Vault "${vaultId}" was not preprocessed this epoch`);
    }
    return entry;
  }

  requireTarget(vaultId: string): VaultTarget {
    const entry = this.targets.get(vaultId);
    if (entry === undefined) {
      throw new OrchestratorError("INVARIANT_VIOLATION", `Vault "${vaultId}" has no target portfolio this epoch`);
    }
    return entry;
  }

  requirePrice(asset: AssetId): PriceQuote {
    const quote = this.prices.get(asset);
    if (quote === undefined) {
      throw new OrchestratorError("INVALID_PRICE", `No epoch price for asset "${asset}"`);
    }
    return quote;
  }

  /** JSON-safe view for status endpoints. */
  summary(): EpochStateSummary {
    return {
      epochCounter: this.epochCounter,
      lastProcessedEpoch: this.lastProcessedEpoch,
      lastEpochStart: this.lastEpochStart,
      statesPhase: this.statesPhase,
      liquidityPhase: this.liquidityPhase,
      statesCursor: this.statesCursor,
      liquidityCursor: this.liquidityCursor,
      pendingDecryptions: [...this.pendingDecryptions.keys()],
      idle: this.isSystemIdle(),
    };
  }
}

export interface EpochStateSummary {
  readonly epochCounter: number;
  readonly lastProcessedEpoch: number;
  readonly lastEpochStart: number;
  readonly statesPhase: StatesPhase;
  readonly liquidityPhase: LiquidityPhase;
  readonly statesCursor: number;
  readonly liquidityCursor: number;
  readonly pendingDecryptions: readonly string[];
  readonly idle: boolean;
}
