/**
 * @pegledger/sdk — PegLedger Client.
 *
 * Typed methods grouped by namespace:
 * - client.token    — token metadata and signing domain
 * - client.accounts — balances, allowances, votes, checkpoints
 * - client.ledger   — mutations (each returns a Receipt) and snapshots
 * - client.events   — committed event log with cursor pagination
 *
 * Amounts go out as bigint and are sent as base-10 strings; response
 * bodies are checked against zod schemas before they are returned.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { HttpClient } from "./http-client.js";
import { PegLedgerApiError } from "./types.js";
import type { PaginatedList, PegLedgerClientConfig, PegLedgerResponse } from "./types.js";

// =============================================================================
// Response Schemas
// =============================================================================

const TokenInfoSchema = z.object({
  name: z.string(),
  symbol: z.string(),
  decimals: z.number().int(),
  totalSupply: z.string(),
  chainId: z.number().int(),
  address: z.string(),
  clock: z.string(),
  clockMode: z.string(),
  domainSeparator: z.string(),
  eip712Version: z.string(),
});

export type TokenInfo = z.infer<typeof TokenInfoSchema>;

const AccountInfoSchema = z.object({
  address: z.string(),
  balance: z.string(),
  balanceFormatted: z.string(),
  nativeBalance: z.string(),
  nonce: z.string(),
  delegate: z.string(),
  votes: z.string(),
  numCheckpoints: z.number().int(),
});

export type AccountInfo = z.infer<typeof AccountInfoSchema>;

const AllowanceInfoSchema = z.object({
  owner: z.string(),
  spender: z.string(),
  allowance: z.string(),
});

export type AllowanceInfo = z.infer<typeof AllowanceInfoSchema>;

const VotesInfoSchema = z.object({
  account: z.string(),
  votes: z.string(),
  at: z.string().nullable(),
});

export type VotesInfo = z.infer<typeof VotesInfoSchema>;

const CheckpointSchema = z.object({
  key: z.string(),
  votes: z.string(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

const ReceiptSchema = z.object({
  operation: z.string(),
  actor: z.string(),
  correlationId: z.string(),
  blockNumber: z.string(),
  events: z.array(
    z.object({
      eventName: z.string(),
      args: z.record(z.string()),
    }),
  ),
  logs: z.array(
    z.object({
      topics: z.array(z.string()),
      data: z.string(),
    }),
  ),
});

export type Receipt = z.infer<typeof ReceiptSchema>;

const CheckpointSnapshotSchema = z.object({ key: z.string(), votes: z.string() });

const SnapshotSchema = z.object({
  version: z.literal(1),
  token: z.object({ name: z.string(), symbol: z.string(), decimals: z.number().int() }),
  chainId: z.number().int(),
  address: z.string(),
  eip712Version: z.string(),
  totalSupply: z.string(),
  balances: z.record(z.string()),
  allowances: z.record(z.record(z.string())),
  nonces: z.record(z.string()),
  delegates: z.record(z.string()),
  checkpoints: z.record(z.array(CheckpointSnapshotSchema)),
  supplyCheckpoints: z.array(CheckpointSnapshotSchema),
  consumedSignatures: z.array(z.string()),
  createdAt: z.string(),
});

export type LedgerSnapshot = z.infer<typeof SnapshotSchema>;

const StoredEventSchema = z.object({
  event: z.object({
    type: z.string(),
    metadata: z.object({
      eventId: z.string(),
      timestamp: z.string(),
      actor: z.string(),
      correlationId: z.string(),
      source: z.string(),
      sequencePoint: z.string().optional(),
    }),
    payload: z.record(z.unknown()),
  }),
  streamId: z.string(),
  version: z.number().int(),
  globalPosition: z.number().int(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});

export type LedgerEventRecord = z.infer<typeof StoredEventSchema>;

const EventPageSchema = z.object({
  data: z.array(StoredEventSchema),
  pagination: z.object({
    cursor: z.string().nullable(),
    hasMore: z.boolean(),
  }),
});

// =============================================================================
// Parameter Types
// =============================================================================

export interface PermitParams {
  readonly owner: string;
  readonly spender: string;
  readonly value: bigint;
  readonly deadline: bigint;
  readonly signature: string;
}

export interface DelegateBySigParams {
  readonly delegatee: string;
  readonly nonce: bigint;
  readonly expiry: bigint;
  readonly signature: string;
}

export interface ListEventsParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
  readonly afterPosition?: number | undefined;
  readonly type?: string | undefined;
}

// =============================================================================
// Decoding
// =============================================================================

function decode<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  result: PegLedgerResponse<unknown>,
): PegLedgerResponse<T> {
  const parsed = schema.safeParse(result.data);
  if (!parsed.success) {
    throw new PegLedgerApiError(
      "INVALID_RESPONSE",
      "Response body did not match the expected shape",
      result.status,
      parsed.error.issues,
    );
  }
  return { data: parsed.data, status: result.status, headers: result.headers };
}

/** Unwrap the `{ data }` envelope most routes answer with. */
function decodeData<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  result: PegLedgerResponse<unknown>,
): PegLedgerResponse<T> {
  const body = result.data;
  const data = typeof body === "object" && body !== null && "data" in body ? body.data : undefined;
  return decode(schema, { ...result, data });
}

function addressPath(address: string): string {
  return `/api/v1/accounts/${encodeURIComponent(address)}`;
}

// =============================================================================
// Namespace Classes
// =============================================================================

export class TokenNamespace {
  constructor(private readonly http: HttpClient) {}

  async info(): Promise<PegLedgerResponse<TokenInfo>> {
    return decodeData(TokenInfoSchema, await this.http.get("/api/v1/token"));
  }
}

export class AccountsNamespace {
  constructor(private readonly http: HttpClient) {}

  async get(address: string): Promise<PegLedgerResponse<AccountInfo>> {
    return decodeData(AccountInfoSchema, await this.http.get(addressPath(address)));
  }

  async allowance(owner: string, spender: string): Promise<PegLedgerResponse<AllowanceInfo>> {
    const result = await this.http.get(
      `${addressPath(owner)}/allowances/${encodeURIComponent(spender)}`,
    );
    return decodeData(AllowanceInfoSchema, result);
  }

  /**
   * Voting power now, or at a past sequence point when `at` is given.
   */
  async votes(address: string, at?: bigint): Promise<PegLedgerResponse<VotesInfo>> {
    const qs = at !== undefined ? `?at=${at.toString()}` : "";
    return decodeData(VotesInfoSchema, await this.http.get(`${addressPath(address)}/votes${qs}`));
  }

  async checkpoints(address: string): Promise<PegLedgerResponse<Checkpoint[]>> {
    const result = await this.http.get(`${addressPath(address)}/checkpoints`);
    return decodeData(z.array(CheckpointSchema), result);
  }
}

export class LedgerNamespace {
  constructor(private readonly http: HttpClient) {}

  private async submit(path: string, body: unknown): Promise<PegLedgerResponse<Receipt>> {
    return decodeData(ReceiptSchema, await this.http.post(`/api/v1/ledger/${path}`, body));
  }

  deposit(account: string, amount: bigint): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("deposit", { account, amount: amount.toString() });
  }

  withdraw(account: string, amount: bigint): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("withdraw", { account, amount: amount.toString() });
  }

  transfer(from: string, to: string, amount: bigint): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("transfer", { from, to, amount: amount.toString() });
  }

  approve(owner: string, spender: string, amount: bigint): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("approve", { owner, spender, amount: amount.toString() });
  }

  transferFrom(
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("transfer-from", { spender, from, to, amount: amount.toString() });
  }

  permit(params: PermitParams): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("permit", {
      owner: params.owner,
      spender: params.spender,
      value: params.value.toString(),
      deadline: params.deadline.toString(),
      signature: params.signature,
    });
  }

  delegate(account: string, delegatee: string): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("delegate", { account, delegatee });
  }

  delegateBySig(params: DelegateBySigParams): Promise<PegLedgerResponse<Receipt>> {
    return this.submit("delegate-by-sig", {
      delegatee: params.delegatee,
      nonce: params.nonce.toString(),
      expiry: params.expiry.toString(),
      signature: params.signature,
    });
  }

  async snapshot(): Promise<PegLedgerResponse<LedgerSnapshot>> {
    return decodeData(SnapshotSchema, await this.http.get("/api/v1/ledger/snapshot"));
  }
}

export class EventsNamespace {
  constructor(private readonly http: HttpClient) {}

  async list(
    params?: ListEventsParams,
  ): Promise<PegLedgerResponse<PaginatedList<LedgerEventRecord>>> {
    const query = new URLSearchParams();
    if (params?.cursor !== undefined) query.set("cursor", params.cursor);
    if (params?.limit !== undefined) query.set("limit", String(params.limit));
    if (params?.afterPosition !== undefined) {
      query.set("afterPosition", String(params.afterPosition));
    }
    if (params?.type !== undefined) query.set("type", params.type);

    const qs = query.toString();
    const path = qs.length > 0 ? `/api/v1/events?${qs}` : "/api/v1/events";
    return decode(EventPageSchema, await this.http.get(path));
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const client = new PegLedgerClient({ baseUrl: "http://localhost:8545" });
 *
 * await client.ledger.deposit(alice, 10n ** 18n);
 * const { data } = await client.accounts.get(alice);
 * ```
 */
export class PegLedgerClient {
  readonly token: TokenNamespace;
  readonly accounts: AccountsNamespace;
  readonly ledger: LedgerNamespace;
  readonly events: EventsNamespace;

  private readonly http: HttpClient;

  constructor(config: PegLedgerClientConfig) {
    this.http = new HttpClient(config);
    this.token = new TokenNamespace(this.http);
    this.accounts = new AccountsNamespace(this.http);
    this.ledger = new LedgerNamespace(this.http);
    this.events = new EventsNamespace(this.http);
  }
}
