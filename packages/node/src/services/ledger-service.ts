/**
 * LedgerService — Composition root for the node.
 *
 * Route handlers delegate to this service; they never touch the ledger
 * directly. The service owns:
 * - the PegLedger and its block clock (one block per committed mutation)
 * - the in-memory native asset the ledger wraps
 * - the FIFO queue every request runs through, so no caller ever observes
 *   a withdrawal in flight
 * - the event store every committed event is appended to
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import {
  BlockClock,
  encodeLedgerLog,
  formatAmount,
  InMemoryNativeAsset,
  LedgerError,
  normalizeAddress,
  PegLedger,
} from "@pegledger/ledger";
import type {
  Address,
  Checkpoint,
  CommittedUnit,
  EncodedLog,
  Hex,
  InvariantReport,
  LedgerEvent,
  LedgerSnapshot,
  TokenMetadata,
} from "@pegledger/ledger";
import {
  createLedgerCatalog,
  InMemoryEventStore,
  LEDGER_STREAM,
} from "@pegledger/event-store";
import type {
  EventCatalog,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@pegledger/event-store";
import type { DomainEvent, LedgerEventName } from "@pegledger/types";
import { SerialQueue } from "./serial-queue.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly chainId: number;
  readonly ledgerAddress: string;
  readonly token: TokenMetadata;
  readonly eip712Version?: string;

  /** Native balances credited before the first request */
  readonly genesis?: readonly { readonly address: string; readonly amount: bigint }[];

  readonly logger?: Logger;

  /** Wall clock in milliseconds. Default: Date.now */
  readonly now?: () => number;
}

// =============================================================================
// Views
// =============================================================================

export interface SerializedEvent {
  readonly eventName: LedgerEventName;
  readonly args: Readonly<Record<string, string>>;
}

export interface Receipt {
  readonly operation: string;
  readonly actor: string;
  readonly correlationId: string;
  readonly blockNumber: string;
  readonly events: readonly SerializedEvent[];
  readonly logs: readonly EncodedLog[];
}

export interface TokenView {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly chainId: number;
  readonly address: Address;
  readonly clock: string;
  readonly clockMode: string;
  readonly domainSeparator: Hex;
  readonly eip712Version: string;
}

export interface AccountView {
  readonly address: Address;
  readonly balance: string;
  readonly balanceFormatted: string;
  readonly nativeBalance: string;
  readonly nonce: string;
  readonly delegate: Address;
  readonly votes: string;
  readonly numCheckpoints: number;
}

export interface CheckpointView {
  readonly key: string;
  readonly votes: string;
}

export interface HealthReport {
  readonly invariants: InvariantReport;
  readonly integrity: EventStoreIntegrityResult;
  readonly pendingRequests: number;
}

/**
 * Raised for work submitted after stop().
 */
export class ServiceStoppedError extends Error {
  readonly code = "SERVICE_UNAVAILABLE";

  constructor() {
    super("Ledger service is stopped");
    this.name = "ServiceStoppedError";
  }
}

interface PendingOperation {
  readonly operation: string;
  readonly actor: string | undefined;
  readonly correlationId: string;
  unit: CommittedUnit | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledger: PegLedger;
  readonly clock: BlockClock;
  readonly native: InMemoryNativeAsset;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;

  private readonly _queue = new SerialQueue();
  private readonly _logger: Logger;
  private readonly _now: () => number;
  private readonly _unsubscribe: () => void;
  private _pending: PendingOperation | undefined;
  private _ready = false;

  constructor(config: LedgerServiceConfig) {
    this._logger = config.logger ?? pino({ level: "silent" });
    this._now = config.now ?? Date.now;

    this.clock = new BlockClock({ now: this._now });
    this.native = new InMemoryNativeAsset(normalizeAddress(config.ledgerAddress, "ledger address"));
    this.eventStore = new InMemoryEventStore({ now: () => new Date(this._now()) });
    this.catalog = createLedgerCatalog();

    this.ledger = new PegLedger({
      token: config.token,
      chainId: config.chainId,
      address: config.ledgerAddress,
      version: config.eip712Version,
      clock: this.clock,
      nativeAsset: this.native,
      onListenerError: (err, unit) => {
        this._logger.error(
          {
            err,
            sequencePoint: unit.sequencePoint.toString(),
            events: unit.events.map((e) => e.eventName),
          },
          "ledger commit listener failed",
        );
      },
    });
    this._unsubscribe = this.ledger.subscribe((unit) => this._record(unit));

    for (const allocation of config.genesis ?? []) {
      this.native.fund(normalizeAddress(allocation.address, "genesis address"), allocation.amount);
    }

    this._ready = true;
  }

  // ─── Peg ───────────────────────────────────────────────────────────

  /**
   * Move native units from `account` into the reserve and mint the same
   * amount. A rejected mint refunds the native units.
   */
  deposit(account: string, amount: bigint): Promise<Receipt> {
    return this._execute("deposit", account, () => {
      const from = normalizeAddress(account, "account");
      const reserve = this.native.reserve;

      if (!this.native.transfer(from, reserve, amount)) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Native balance of ${from} is below ${amount.toString()}`,
          { asset: "native", account: from, amount: amount.toString() },
        );
      }

      try {
        this.ledger.depositValue(from, amount);
      } catch (err) {
        this.native.transfer(reserve, from, amount);
        throw err;
      }
    });
  }

  withdraw(account: string, amount: bigint): Promise<Receipt> {
    return this._execute("withdraw", account, () => this.ledger.withdrawValue(account, amount));
  }

  // ─── Token ─────────────────────────────────────────────────────────

  transfer(from: string, to: string, amount: bigint): Promise<Receipt> {
    return this._execute("transfer", from, () => this.ledger.transfer(from, to, amount));
  }

  approve(owner: string, spender: string, amount: bigint): Promise<Receipt> {
    return this._execute("approve", owner, () => this.ledger.approve(owner, spender, amount));
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<Receipt> {
    return this._execute("transferFrom", spender, () =>
      this.ledger.spendFrom(spender, from, to, amount),
    );
  }

  permit(
    owner: string,
    spender: string,
    value: bigint,
    deadline: bigint,
    signature: string,
  ): Promise<Receipt> {
    return this._execute("permit", owner, () =>
      this.ledger.approveBySignature(owner, spender, value, deadline, signature),
    );
  }

  // ─── Delegation ────────────────────────────────────────────────────

  delegate(account: string, delegatee: string): Promise<Receipt> {
    return this._execute("delegate", account, () => this.ledger.delegate(account, delegatee));
  }

  /** The actor is the recovered signer, known only once the unit commits. */
  delegateBySig(
    delegatee: string,
    nonce: bigint,
    expiry: bigint,
    signature: string,
  ): Promise<Receipt> {
    return this._execute("delegateBySig", undefined, () =>
      this.ledger.delegateBySignature(delegatee, nonce, expiry, signature),
    );
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  token(): Promise<TokenView> {
    return this._enqueue(() => {
      const domain = this.ledger.eip712Domain();
      return {
        name: this.ledger.name(),
        symbol: this.ledger.symbol(),
        decimals: this.ledger.decimals(),
        totalSupply: this.ledger.totalSupply().toString(),
        chainId: this.ledger.chainId,
        address: this.ledger.address,
        clock: this.ledger.clock().toString(),
        clockMode: this.ledger.CLOCK_MODE(),
        domainSeparator: this.ledger.DOMAIN_SEPARATOR(),
        eip712Version: domain.version,
      };
    });
  }

  account(address: string): Promise<AccountView> {
    return this._enqueue(() => {
      const account = normalizeAddress(address, "account");
      const balance = this.ledger.balanceOf(account);
      return {
        address: account,
        balance: balance.toString(),
        balanceFormatted: formatAmount(balance, this.ledger.decimals()),
        nativeBalance: this.native.balanceOf(account).toString(),
        nonce: this.ledger.nonces(account).toString(),
        delegate: this.ledger.delegates(account),
        votes: this.ledger.getVotes(account).toString(),
        numCheckpoints: this.ledger.numCheckpoints(account),
      };
    });
  }

  allowance(owner: string, spender: string): Promise<string> {
    return this._enqueue(() => this.ledger.allowance(owner, spender).toString());
  }

  votes(account: string, at?: bigint): Promise<string> {
    return this._enqueue(() => this.ledger.getVotes(account, at).toString());
  }

  checkpoints(account: string): Promise<readonly CheckpointView[]> {
    return this._enqueue(() =>
      this.ledger.checkpointSeries(account).map(toCheckpointView),
    );
  }

  snapshot(): Promise<LedgerSnapshot> {
    return this._enqueue(() => this.ledger.snapshot(new Date(this._now()).toISOString()));
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    if (!this._ready) throw new ServiceStoppedError();
    return this.eventStore.readAll(options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkHealth(): Promise<HealthReport> {
    return this._queue.run(() => ({
      invariants: this.ledger.checkInvariants(),
      integrity: this.eventStore.verifyIntegrity(),
      pendingRequests: this._queue.pending - 1,
    }));
  }

  isReady(): boolean {
    return this._ready;
  }

  /**
   * Refuse new work and wait for queued requests to settle. Health checks
   * still answer so /ready can report the stop.
   */
  async stop(): Promise<void> {
    this._ready = false;
    await this._queue.run(() => undefined);
    this._unsubscribe();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    if (!this._ready) {
      return Promise.reject(new ServiceStoppedError());
    }
    return this._queue.run(task);
  }

  private _execute(
    operation: string,
    actor: string | undefined,
    fn: () => unknown,
  ): Promise<Receipt> {
    return this._enqueue(async () => {
      const pending: PendingOperation = {
        operation,
        actor,
        correlationId: randomUUID(),
        unit: undefined,
      };
      this._pending = pending;

      try {
        await fn();
      } catch (err) {
        if (err instanceof LedgerError) {
          this._logger.info(
            { operation, actor, code: err.code, correlationId: pending.correlationId },
            "ledger operation rejected",
          );
        } else {
          this._logger.error({ operation, actor, err }, "ledger operation failed");
        }
        throw err;
      } finally {
        this._pending = undefined;
      }

      const unit = pending.unit;
      const blockNumber = unit?.sequencePoint ?? this.clock.blockNumber();
      if (unit !== undefined) {
        this.clock.mine();
      }

      const receipt: Receipt = {
        operation,
        actor: actor ?? actorOf(unit?.events ?? []),
        correlationId: pending.correlationId,
        blockNumber: blockNumber.toString(),
        events: (unit?.events ?? []).map(serializeEvent),
        logs: (unit?.events ?? []).map(encodeLedgerLog),
      };

      this._logger.debug(
        {
          operation,
          actor: receipt.actor,
          correlationId: receipt.correlationId,
          blockNumber: receipt.blockNumber,
          events: receipt.events.length,
        },
        "ledger operation committed",
      );
      return receipt;
    });
  }

  /**
   * Commit listener: check each event against its catalog schema, then
   * append the unit's events to the ledger stream.
   */
  private _record(unit: CommittedUnit): void {
    const pending = this._pending;
    if (pending !== undefined) {
      pending.unit = unit;
    }

    const timestamp = new Date(this._now()).toISOString();
    const actor = pending?.actor ?? actorOf(unit.events);
    const correlationId = pending?.correlationId ?? randomUUID();

    const events: DomainEvent[] = unit.events.map((event) => {
      const payload = serializeEvent(event).args;
      const schema = this.catalog.assertValid(event.eventName, payload);
      return {
        type: event.eventName,
        metadata: {
          eventId: randomUUID(),
          timestamp,
          actor,
          correlationId,
          sequencePoint: unit.sequencePoint.toString(),
          source: schema.source,
        },
        payload,
      };
    });

    this.eventStore.append(LEDGER_STREAM, events);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Event arguments with every bigint as a base-10 string.
 */
export function serializeEvent(event: LedgerEvent): SerializedEvent {
  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(event.args)) {
    args[key] = String(value);
  }
  return { eventName: event.eventName, args };
}

function toCheckpointView(checkpoint: Checkpoint): CheckpointView {
  return { key: checkpoint.key.toString(), votes: checkpoint.votes.toString() };
}

/** The delegator of a signed delegation, for units whose caller is unnamed. */
function actorOf(events: readonly LedgerEvent[]): string {
  for (const event of events) {
    if (event.eventName === "DelegateChanged") {
      return event.args.delegator;
    }
  }
  return "unknown";
}
