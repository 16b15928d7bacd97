/**
 * Synth Engine - In-Memory Host
 *
 * Standalone implementation of the host capabilities: a settable caller,
 * a manually advanced block clock and a balance ledger for transfers.
 * Used by the local entry point and by the test suite.
 */

import { EngineCapabilities } from "./engine";
import { EngineError } from "./errors";
import { Identity } from "./state";

export interface TransferEntry {
  amount: bigint;
  from: Identity;
  to: Identity;
  block: bigint;
}

export class InMemoryHost implements EngineCapabilities {
  private caller: Identity;
  private block: bigint;
  private readonly balances = new Map<Identity, bigint>();
  readonly transfers: TransferEntry[] = [];
  /** When set, every transfer fails */
  failTransfers = false;

  constructor(
    private readonly custody: Identity,
    options: { caller?: Identity; block?: bigint } = {},
  ) {
    this.caller = options.caller ?? custody;
    this.block = options.block ?? 0n;
  }

  // ── capabilities ───────────────────────────────────────────

  currentCaller(): Identity {
    return this.caller;
  }

  blockHeight(): bigint {
    return this.block;
  }

  custodyIdentity(): Identity {
    return this.custody;
  }

  transfer(amount: bigint, from: Identity, to: Identity): void {
    if (this.failTransfers) {
      throw new EngineError("TransferFailed", "transfers disabled");
    }
    const available = this.balanceOf(from);
    if (amount > available) {
      throw new EngineError("TransferFailed", `${from} holds ${available}, needs ${amount}`);
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.transfers.push({ amount, from, to, block: this.block });
  }

  // ── controls ───────────────────────────────────────────────

  /** Subsequent engine calls are made by `identity` */
  actAs(identity: Identity): this {
    this.caller = identity;
    return this;
  }

  advanceBlocks(blocks: bigint): bigint {
    if (blocks < 0n) throw new Error("block height cannot decrease");
    this.block += blocks;
    return this.block;
  }

  fund(identity: Identity, amount: bigint): void {
    this.balances.set(identity, this.balanceOf(identity) + amount);
  }

  balanceOf(identity: Identity): bigint {
    return this.balances.get(identity) ?? 0n;
  }
}
