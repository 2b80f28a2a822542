/**
 * Keeper — Interval-driven upkeep.
 *
 * Each tick asks the states orchestrator, then the liquidity orchestrator,
 * whether work is due and performs the returned payload as the automation
 * principal. A failed upkeep is logged with its error code and retried on
 * the next tick; the protocol state is unchanged by a failed call.
 * While running, every event the protocol records is logged at debug.
 */

import type { Logger } from "pino";
import type { Subscription } from "@meridian/event-store";
import type { Protocol } from "@meridian/orchestrator";

export type KeeperOrchestrator = "states" | "liquidity";

export interface KeeperStep {
  readonly orchestrator: KeeperOrchestrator;
  readonly action: string;
  readonly minibatchIndex: number;
  readonly performed: boolean;
  readonly phase: string;
  readonly epoch: number;
}

export interface KeeperOptions {
  readonly protocol: Protocol;
  /** Automation registry principal */
  readonly principal: string;
  readonly logger: Logger;
  readonly intervalMs: number;
}

function codeOf(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

export class Keeper {
  private readonly protocol: Protocol;
  private readonly principal: string;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | undefined;
  private subscription: Subscription | undefined;

  constructor(options: KeeperOptions) {
    this.protocol = options.protocol;
    this.principal = options.principal;
    this.logger = options.logger.child({ component: "keeper" });
    this.intervalMs = options.intervalMs;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer !== undefined) {
      return;
    }
    this.subscription = this.protocol.store.subscribeAll(({ streamId, version, globalPosition, event }) => {
      this.logger.debug({ streamId, version, globalPosition, type: event.type }, "Event recorded");
    });
    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, "Keeper started");
  }

  stop(): void {
    if (this.timer === undefined) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    this.logger.info("Keeper stopped");
  }

  /**
   * At most one upkeep per orchestrator. Returns the performed steps.
   */
  tick(): readonly KeeperStep[] {
    const steps: KeeperStep[] = [];
    const states = this.upkeepStates();
    if (states !== undefined) {
      steps.push(states);
    }
    const liquidity = this.upkeepLiquidity();
    if (liquidity !== undefined) {
      steps.push(liquidity);
    }
    return steps;
  }

  private upkeepStates(): KeeperStep | undefined {
    const check = this.protocol.states.checkUpkeep();
    if (!check.needed) {
      return undefined;
    }
    const { action, minibatchIndex } = check.payload;
    try {
      const result = this.protocol.states.performUpkeep(this.principal, check.payload);
      return this.performed({ orchestrator: "states", action, minibatchIndex, ...result });
    } catch (err) {
      this.failed("states", action, err);
      return undefined;
    }
  }

  private upkeepLiquidity(): KeeperStep | undefined {
    const check = this.protocol.liquidity.checkUpkeep();
    if (!check.needed) {
      return undefined;
    }
    const { action, minibatchIndex } = check.payload;
    try {
      const result = this.protocol.liquidity.performUpkeep(this.principal, check.payload);
      return this.performed({ orchestrator: "liquidity", action, minibatchIndex, ...result });
    } catch (err) {
      this.failed("liquidity", action, err);
      return undefined;
    }
  }

  private performed(step: KeeperStep): KeeperStep {
    this.logger.info(step, `${step.orchestrator} ${step.action} → ${step.phase}`);
    return step;
  }

  private failed(orchestrator: KeeperOrchestrator, action: string, err: unknown): void {
    this.logger.error(
      { orchestrator, action, code: codeOf(err), err },
      `${orchestrator} ${action} failed`,
    );
  }
}
