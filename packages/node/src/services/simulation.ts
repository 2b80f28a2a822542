/**
 * Builds the node's Protocol from configuration against the in-process
 * adapters: a static price table seeded from ASSETS, a venue that fills
 * at those prices less SIMULATED_SLIPPAGE_BPS, and a queue of decryption
 * requests answered over HTTP.
 */

import type { AssetId } from "@meridian/types";
import type { Clock } from "@meridian/vault";
import {
  Protocol,
  QueuedDecryptor,
  SimulatedExecutionAdapter,
  StaticPriceAdapter,
} from "@meridian/orchestrator";
import type { AppConfig } from "../config.js";
import { parametersFrom, parseAssets, parseList, principalsFrom } from "../config.js";

export interface SimulatedProtocol {
  readonly protocol: Protocol;
  readonly prices: StaticPriceAdapter;
  readonly execution: SimulatedExecutionAdapter;
  readonly decryptor: QueuedDecryptor;
}

export function createSimulatedProtocol(config: AppConfig, clock?: Clock): SimulatedProtocol {
  const assets = parseAssets(config.ASSETS);
  const prices = new StaticPriceAdapter();
  for (const { asset, quote } of assets) {
    prices.setPrice(asset.id, quote);
  }
  const decryptor = new QueuedDecryptor();
  const execution = new SimulatedExecutionAdapter({
    prices,
    underlyingDecimals: config.UNDERLYING_DECIMALS,
    decimalsOf: (asset: AssetId): number => protocol.config.assetDecimals(asset),
    slippageBps: config.SIMULATED_SLIPPAGE_BPS,
  });

  const protocol = new Protocol({
    underlying: { id: config.UNDERLYING_ASSET, decimals: config.UNDERLYING_DECIMALS },
    principals: principalsFrom(config),
    parameters: parametersFrom(config),
    adapters: { prices, execution, decryptor },
    clock,
  });

  for (const { asset } of assets) {
    protocol.config.whitelistAsset(config.ADMIN_PRINCIPAL, asset);
  }
  for (const curator of parseList(config.CURATORS)) {
    protocol.config.whitelistCurator(config.ADMIN_PRINCIPAL, curator);
  }

  return { protocol, prices, execution, decryptor };
}
