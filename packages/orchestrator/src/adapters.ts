/**
 * In-process adapters.
 *
 * A static price table, a venue that fills every order at the quoted
 * price less a fixed slippage, and a decryptor that queues requests for
 * whoever holds the key. Used by the node in simulation mode and by tests.
 */

import type { AssetId, OrderSide, PriceQuote } from "@meridian/types";
import { BPS, assertValidQuote, mulDiv, valueInUnderlying } from "@meridian/accounting";
import type {
  DecryptionRequest,
  ExecutionAdapter,
  IntentDecryptor,
  PriceAdapter,
} from "./types.js";
import { OrchestratorError } from "./types.js";

// ─── Prices ──────────────────────────────────────────────────────────────

export class StaticPriceAdapter implements PriceAdapter {
  private readonly quotes = new Map<AssetId, PriceQuote>();

  constructor(initial: Readonly<Record<AssetId, PriceQuote>> = {}) {
    for (const [asset, quote] of Object.entries(initial)) {
      this.quotes.set(asset, quote);
    }
  }

  setPrice(asset: AssetId, quote: PriceQuote): void {
    this.quotes.set(asset, quote);
  }

  quote(asset: AssetId): PriceQuote {
    const quote = this.quotes.get(asset);
    if (quote === undefined) {
      throw new OrchestratorError("INVALID_PRICE", `No price configured for asset "${asset}"`);
    }
    return quote;
  }
}

// ─── Execution ───────────────────────────────────────────────────────────

export interface ExecutionRecord {
  readonly side: OrderSide;
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly bound: bigint;
  readonly underlyingAmount: bigint;
}

export interface SimulatedExecutionOptions {
  readonly prices: PriceAdapter;
  readonly underlyingDecimals: number;
  decimalsOf(asset: AssetId): number;
  /** Price impact applied against the trader. Default 0. */
  readonly slippageBps?: number;
}

/**
 * Fills at the adapter's current quote. A fill that would land outside
 * its bound is refused before anything executes.
 */
export class SimulatedExecutionAdapter implements ExecutionAdapter {
  readonly executions: ExecutionRecord[] = [];
  private slippageBps: number;

  constructor(private readonly options: SimulatedExecutionOptions) {
    this.slippageBps = options.slippageBps ?? 0;
  }

  setSlippage(bps: number): void {
    this.slippageBps = bps;
  }

  execute(side: OrderSide, asset: AssetId, amount: bigint, bound: bigint): bigint {
    const quote = this.options.prices.quote(asset);
    assertValidQuote(asset, quote);
    const value = valueInUnderlying(amount, this.options.decimalsOf(asset), quote, this.options.underlyingDecimals, "floor");
    const impact = BigInt(this.slippageBps);
    const underlyingAmount = side === "sell"
      ? mulDiv(value, BPS - impact, BPS, "floor")
      : mulDiv(value, BPS + impact, BPS, "ceil");
    if (side === "sell" ? underlyingAmount < bound : underlyingAmount > bound) {
      throw new OrchestratorError(
        "SLIPPAGE_EXCEEDED",
        `${side} of ${amount} "${asset}" would fill at ${underlyingAmount}, bound ${bound}`,
      );
    }

    this.executions.push({ side, asset, amount, bound, underlyingAmount });
    return underlyingAmount;
  }
}

// ─── Decryption ──────────────────────────────────────────────────────────

export class QueuedDecryptor implements IntentDecryptor {
  private readonly queue: DecryptionRequest[] = [];

  requestDecryption(request: DecryptionRequest): void {
    this.queue.push(request);
  }

  get pending(): readonly DecryptionRequest[] {
    return this.queue;
  }

  /** Removes and returns every queued request. */
  take(): DecryptionRequest[] {
    return this.queue.splice(0, this.queue.length);
  }
}
