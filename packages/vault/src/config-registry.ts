/**
 * ConfigRegistry — Protocol configuration.
 *
 * Holds the underlying asset, the asset and curator whitelists, the
 * protocol principals, bounded parameters and the pause switch.
 *
 * Rules:
 * - Every update is admin-only and allowed only while the system is idle
 * - Out-of-bound values fail with INVALID_CONFIG and change nothing
 * - The guardian or the admin pauses; only the admin unpauses
 * - A removed asset drains first and leaves the whitelist once empty
 */

import type { AssetId, AssetInfo } from "@meridian/types";
import { pow10 } from "@meridian/accounting";
import type { EventStore } from "@meridian/event-store";
import { EventRecorder, PROTOCOL_EVENTS } from "@meridian/event-store";
import type {
  PrincipalRole,
  ProtocolParameters,
  ProtocolPrincipals,
  SystemStatus,
  WhitelistedAsset,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Parameters
// =============================================================================

export const DEFAULT_PARAMETERS: ProtocolParameters = {
  epochDurationSeconds: 86_400,
  minibatchSize: 8,
  slippageToleranceBps: 100,
  bufferRatioBps: 100,
  riskFreeRateBps: 0,
  volumeFeeBps: 0,
  revenueShareBps: 0,
  minDepositAmount: 0n,
  minRedeemAmount: 0n,
  feeChangeCooldownSeconds: 7 * 86_400,
};

type NumericParameter = {
  [K in keyof ProtocolParameters]: ProtocolParameters[K] extends number ? K : never;
}[keyof ProtocolParameters];

/** Inclusive bounds. */
const NUMERIC_BOUNDS: readonly (readonly [NumericParameter, number, number])[] = [
  ["epochDurationSeconds", 60, 31_536_000],
  ["minibatchSize", 1, 1_000],
  ["slippageToleranceBps", 0, 2_000],
  ["bufferRatioBps", 1, 500],
  ["riskFreeRateBps", 0, 10_000],
  ["volumeFeeBps", 0, 50],
  ["revenueShareBps", 0, 2_000],
  ["feeChangeCooldownSeconds", 0, 90 * 86_400],
];

const MAX_DECIMALS = 36;

function validateParameters(params: ProtocolParameters): void {
  for (const [key, min, max] of NUMERIC_BOUNDS) {
    const value = params[key];
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new VaultError("INVALID_CONFIG", `${key} must be an integer in [${min}, ${max}], got ${String(value)}`);
    }
  }
  for (const key of ["minDepositAmount", "minRedeemAmount"] as const) {
    const value = params[key];
    if (typeof value !== "bigint" || value < 0n) {
      throw new VaultError("INVALID_CONFIG", `${key} must be a non-negative bigint`);
    }
  }
}

function validateDecimals(asset: AssetInfo): void {
  if (!Number.isInteger(asset.decimals) || asset.decimals < 0 || asset.decimals > MAX_DECIMALS) {
    throw new VaultError(
      "INVALID_CONFIG",
      `Asset "${asset.id}" decimals must be an integer in [0, ${MAX_DECIMALS}], got ${String(asset.decimals)}`,
    );
  }
}

function serializeParameters(patch: Partial<ProtocolParameters>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(patch)) {
    out[key] = String(value);
  }
  return out;
}

// =============================================================================
// Registry
// =============================================================================

export interface ConfigRegistryInit {
  readonly underlying: AssetInfo;
  readonly principals: ProtocolPrincipals;
  readonly parameters?: Partial<ProtocolParameters>;
}

export class ConfigRegistry {
  readonly underlying: AssetInfo;
  private _parameters: ProtocolParameters;
  private _principals: ProtocolPrincipals;
  private _paused = false;
  private readonly assets = new Map<AssetId, WhitelistedAsset>();
  private readonly curators = new Set<string>();
  private readonly dustOverrides = new Map<AssetId, bigint>();
  private readonly recorder: EventRecorder;

  constructor(
    init: ConfigRegistryInit,
    private readonly status: SystemStatus,
    store: EventStore,
  ) {
    validateDecimals(init.underlying);
    const parameters = { ...DEFAULT_PARAMETERS, ...init.parameters };
    validateParameters(parameters);

    this.underlying = init.underlying;
    this._parameters = parameters;
    this._principals = init.principals;
    this.recorder = new EventRecorder(store, "config");
  }

  get parameters(): ProtocolParameters {
    return this._parameters;
  }

  get principals(): ProtocolPrincipals {
    return this._principals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Guards
  // ───────────────────────────────────────────────────────────────────────

  hasRole(caller: string, role: PrincipalRole): boolean {
    return this._principals[role] === caller;
  }

  requireRole(caller: string, ...roles: readonly PrincipalRole[]): void {
    if (!roles.some((role) => this.hasRole(caller, role))) {
      throw new VaultError("NOT_AUTHORIZED", `Caller "${caller}" is not ${roles.join(" or ")}`);
    }
  }

  requireIdle(operation: string): void {
    if (!this.status.isSystemIdle()) {
      throw new VaultError("SYSTEM_NOT_IDLE", `Cannot ${operation} while an epoch is in progress`);
    }
  }

  requireNotPaused(operation: string): void {
    if (this._paused) {
      throw new VaultError("PROTOCOL_PAUSED", `Cannot ${operation} while the protocol is paused`);
    }
  }

  private requireAdminUpdate(caller: string, operation: string): void {
    this.requireRole(caller, "admin");
    this.requireIdle(operation);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Parameters and principals
  // ───────────────────────────────────────────────────────────────────────

  updateParameters(caller: string, patch: Partial<ProtocolParameters>): ProtocolParameters {
    this.requireAdminUpdate(caller, "update parameters");

    const next = { ...this._parameters, ...patch };
    validateParameters(next);
    this._parameters = next;

    this.recorder.record("config", PROTOCOL_EVENTS.PARAMETER_UPDATED, { actor: caller }, {
      changes: serializeParameters(patch),
    });
    return next;
  }

  setPrincipal(caller: string, role: PrincipalRole, principal: string): void {
    this.requireAdminUpdate(caller, "update principals");
    if (principal.length === 0) {
      throw new VaultError("INVALID_CONFIG", `Principal for ${role} must be non-empty`);
    }

    this._principals = { ...this._principals, [role]: principal };
    this.recorder.record("config", PROTOCOL_EVENTS.PRINCIPAL_UPDATED, { actor: caller }, { role, principal });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Asset whitelist
  // ───────────────────────────────────────────────────────────────────────

  whitelistAsset(caller: string, asset: AssetInfo): WhitelistedAsset {
    this.requireAdminUpdate(caller, "whitelist assets");
    validateDecimals(asset);
    if (asset.id === this.underlying.id || this.assets.has(asset.id)) {
      throw new VaultError("INVALID_CONFIG", `Asset "${asset.id}" is already known`);
    }

    const entry: WhitelistedAsset = { id: asset.id, decimals: asset.decimals, status: "active" };
    this.assets.set(asset.id, entry);
    this.recorder.record("config", PROTOCOL_EVENTS.ASSET_WHITELISTED, { actor: caller }, {
      asset: asset.id,
      decimals: asset.decimals,
    });
    return entry;
  }

  /**
   * Start draining an asset. Vault targets for it become zero from the
   * next epoch on and its sells execute before any other sell.
   */
  removeWhitelistedAsset(caller: string, assetId: AssetId): void {
    this.requireAdminUpdate(caller, "remove assets");
    const entry = this.requireWhitelisted(assetId);
    if (entry.status === "draining") {
      return;
    }

    this.assets.set(assetId, { ...entry, status: "draining" });
    this.recorder.record("config", PROTOCOL_EVENTS.ASSET_REMOVAL_REQUESTED, { actor: caller }, { asset: assetId });
  }

  /**
   * Drop a drained asset. Called by the liquidity orchestrator once no
   * vault record holds it and custody holds at most dust.
   */
  finalizeAssetRemoval(assetId: AssetId, actor: string): void {
    const entry = this.requireWhitelisted(assetId);
    if (entry.status !== "draining") {
      throw new VaultError("INVALID_CONFIG", `Asset "${assetId}" is not draining`);
    }

    this.assets.delete(assetId);
    this.dustOverrides.delete(assetId);
    this.recorder.record("config", PROTOCOL_EVENTS.ASSET_REMOVED, { actor }, { asset: assetId });
  }

  /** Whitelisted assets other than the underlying, draining ones included. */
  whitelistedAssets(): readonly WhitelistedAsset[] {
    return [...this.assets.values()];
  }

  /** Whether new intents may allocate to the asset. */
  isInvestable(assetId: AssetId): boolean {
    return assetId === this.underlying.id || this.assets.get(assetId)?.status === "active";
  }

  isDraining(assetId: AssetId): boolean {
    return this.assets.get(assetId)?.status === "draining";
  }

  assetDecimals(assetId: AssetId): number {
    if (assetId === this.underlying.id) {
      return this.underlying.decimals;
    }
    return this.requireWhitelisted(assetId).decimals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Dust thresholds
  // ───────────────────────────────────────────────────────────────────────

  setDustThreshold(caller: string, assetId: AssetId, threshold: bigint): void {
    this.requireAdminUpdate(caller, "update dust thresholds");
    this.requireWhitelisted(assetId);
    if (threshold < 0n) {
      throw new VaultError("INVALID_CONFIG", "Dust threshold must be non-negative");
    }

    this.dustOverrides.set(assetId, threshold);
    this.recorder.record("config", PROTOCOL_EVENTS.PARAMETER_UPDATED, { actor: caller }, {
      changes: { [`dustThreshold.${assetId}`]: threshold.toString() },
    });
  }

  /**
   * Largest netted order size, in the asset's own units, that is not
   * traded. Default: 10^(decimals - 2).
   */
  dustThreshold(assetId: AssetId): bigint {
    const override = this.dustOverrides.get(assetId);
    if (override !== undefined) {
      return override;
    }
    return pow10(Math.max(this.assetDecimals(assetId) - 2, 0));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Curators
  // ───────────────────────────────────────────────────────────────────────

  whitelistCurator(caller: string, curator: string): void {
    this.requireAdminUpdate(caller, "whitelist curators");
    if (curator.length === 0 || this.curators.has(curator)) {
      throw new VaultError("INVALID_CONFIG", `Curator "${curator}" is empty or already whitelisted`);
    }

    this.curators.add(curator);
    this.recorder.record("config", PROTOCOL_EVENTS.CURATOR_WHITELISTED, { actor: caller }, { curator });
  }

  isCurator(principal: string): boolean {
    return this.curators.has(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pause
  // ───────────────────────────────────────────────────────────────────────

  isPaused(): boolean {
    return this._paused;
  }

  pause(caller: string): void {
    this.requireRole(caller, "guardian", "admin");
    if (this._paused) {
      return;
    }
    this._paused = true;
    this.recorder.record("config", PROTOCOL_EVENTS.PROTOCOL_PAUSED, { actor: caller }, {});
  }

  unpause(caller: string): void {
    this.requireRole(caller, "admin");
    if (!this._paused) {
      return;
    }
    this._paused = false;
    this.recorder.record("config", PROTOCOL_EVENTS.PROTOCOL_UNPAUSED, { actor: caller }, {});
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireWhitelisted(assetId: AssetId): WhitelistedAsset {
    const entry = this.assets.get(assetId);
    if (entry === undefined) {
      throw new VaultError("UNKNOWN_ASSET", `Asset "${assetId}" is not whitelisted`);
    }
    return entry;
  }
}
