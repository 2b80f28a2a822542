/**
 * JSON views of protocol values. Bigints leave the node as decimal strings.
 */

import type { Order } from "@meridian/types";
import type { EpochOrderBook } from "@meridian/orchestrator";
import type { ProtocolParameters } from "@meridian/vault";

export interface OrderView {
  readonly asset: string;
  readonly side: Order["side"];
  readonly amount: string;
  readonly estimatedUnderlyingValue: string;
  readonly draining: boolean;
}

export interface OrderBookView {
  readonly epoch: number;
  readonly sells: readonly OrderView[];
  readonly buys: readonly OrderView[];
  readonly filteredAsDust: readonly string[];
}

export type ParametersView = {
  readonly [K in keyof ProtocolParameters]: ProtocolParameters[K] extends bigint ? string : ProtocolParameters[K];
};

export function orderView(order: Order): OrderView {
  return {
    asset: order.asset,
    side: order.side,
    amount: order.amount.toString(),
    estimatedUnderlyingValue: order.estimatedUnderlyingValue.toString(),
    draining: order.draining,
  };
}

export function orderBookView(book: EpochOrderBook): OrderBookView {
  return {
    epoch: book.epoch,
    sells: book.sells.map(orderView),
    buys: book.buys.map(orderView),
    filteredAsDust: book.filteredAsDust,
  };
}

export function parametersView(parameters: ProtocolParameters): ParametersView {
  return {
    ...parameters,
    minDepositAmount: parameters.minDepositAmount.toString(),
    minRedeemAmount: parameters.minRedeemAmount.toString(),
  };
}
