/**
 * Transfer gateways — where withdrawn value goes.
 *
 * The vault only knows a TransferFn. A gateway adapts an outbound
 * payment channel to that shape. The in-memory gateway records payouts
 * and is the default when no real channel is configured.
 */

import type { Amount, Principal } from "@custody/types";
import type { TransferFn } from "@custody/vault";

export interface TransferGateway {
  send(to: Principal, amount: Amount): Promise<void>;
}

export interface Payout {
  readonly to: Principal;
  readonly amount: Amount;
  readonly sentAt: string;
}

export class InMemoryTransferGateway implements TransferGateway {
  private readonly _payouts: Payout[] = [];
  private readonly _now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this._now = now;
  }

  async send(to: Principal, amount: Amount): Promise<void> {
    this._payouts.push({ to, amount, sentAt: this._now().toISOString() });
  }

  payouts(): readonly Payout[] {
    return [...this._payouts];
  }

  /** Total value sent to `to`. */
  totalSentTo(to: Principal): Amount {
    return this._payouts
      .filter((p) => p.to === to)
      .reduce((sum, p) => sum + p.amount, 0n);
  }
}

/**
 * Bind a gateway's `send` as a vault TransferFn.
 */
export function toTransferFn(gateway: TransferGateway): TransferFn {
  return (to, amount) => gateway.send(to, amount);
}
