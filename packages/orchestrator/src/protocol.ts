/**
 * Protocol — Composition root.
 *
 * Wires one event store, configuration, custody, the vault registry and
 * both orchestrators around a single EpochState. The epoch state is the
 * system status every idle-only operation consults.
 */

import type { AssetInfo } from "@meridian/types";
import type { EventStore } from "@meridian/event-store";
import { InMemoryEventStore } from "@meridian/event-store";
import type { Clock, ProtocolParameters, ProtocolPrincipals } from "@meridian/vault";
import { ConfigRegistry, Custody, VaultRegistry, systemClock } from "@meridian/vault";
import { EpochState } from "./epoch-state.js";
import { LiquidityOrchestrator } from "./liquidity-orchestrator.js";
import { StatesOrchestrator } from "./states-orchestrator.js";
import type { AdapterFactory, ProtocolAdapters } from "./types.js";

export interface ProtocolOptions {
  readonly underlying: AssetInfo;
  readonly principals: ProtocolPrincipals;
  readonly parameters?: Partial<ProtocolParameters>;
  /** Adapters, or a factory that receives the configuration registry. */
  readonly adapters: ProtocolAdapters | AdapterFactory;
  readonly store?: EventStore;
  /** Seconds since the Unix epoch */
  readonly clock?: Clock;
}

export class Protocol {
  readonly store: EventStore;
  readonly state: EpochState;
  readonly config: ConfigRegistry;
  readonly custody: Custody;
  readonly vaults: VaultRegistry;
  readonly adapters: ProtocolAdapters;
  readonly states: StatesOrchestrator;
  readonly liquidity: LiquidityOrchestrator;
  readonly clock: Clock;

  constructor(options: ProtocolOptions) {
    this.store = options.store ?? new InMemoryEventStore();
    this.clock = options.clock ?? systemClock;
    this.state = new EpochState();
    this.config = new ConfigRegistry(
      { underlying: options.underlying, principals: options.principals, parameters: options.parameters },
      this.state,
      this.store,
    );
    this.custody = new Custody(this.config, this.store);
    this.vaults = new VaultRegistry(this.config, this.custody, this.store, this.clock);
    this.adapters = typeof options.adapters === "function" ? options.adapters(this.config) : options.adapters;

    this.states = new StatesOrchestrator({
      state: this.state,
      config: this.config,
      vaults: this.vaults,
      custody: this.custody,
      prices: this.adapters.prices,
      decryptor: this.adapters.decryptor,
      store: this.store,
      clock: this.clock,
    });
    this.liquidity = new LiquidityOrchestrator({
      state: this.state,
      config: this.config,
      vaults: this.vaults,
      custody: this.custody,
      execution: this.adapters.execution,
      store: this.store,
    });
  }

  isSystemIdle(): boolean {
    return this.state.isSystemIdle();
  }
}
