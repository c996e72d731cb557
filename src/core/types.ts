import type { Address, Amount } from "../types/brands";
import type { LedgerError } from "./errors";

export type { Address, Amount, Hex } from "../types/brands";

/* ── storage ─────────────────────────────────────────────── */
export type AllowanceKey = `${Address}:${Address}`;

export type TokenMetadata = {
  readonly name: string | null;
  readonly symbol: string | null;
  readonly decimals: number;
};

export type LedgerState = {
  readonly totalSupply: Amount;
  /* sparse: a zero balance is never stored */
  readonly balances: ReadonlyMap<Address, Amount>;
  /* sparse: a zero allowance is never stored */
  readonly allowances: ReadonlyMap<AllowanceKey, Amount>;
  readonly metadata: TokenMetadata;
};

export type LedgerParams = {
  initialSupply: Amount;
  name: string | null;
  symbol: string | null;
  decimals: number;
};

/* ── notifications ───────────────────────────────────────── */
export type TransferEvent = {
  type: "Transfer";
  from: Address | null; // null = minted
  to: Address | null; // null = burned
  value: Amount;
};

export type ApprovalEvent = {
  type: "Approval";
  owner: Address;
  spender: Address;
  value: Amount;
};

export type LedgerEvent = TransferEvent | ApprovalEvent;

/* ── mutating calls ──────────────────────────────────────── */
export type Command =
  | { type: "transfer"; to: Address; value: Amount }
  | { type: "transferFrom"; from: Address; to: Address; value: Amount }
  | { type: "approve"; spender: Address; value: Amount }
  | { type: "increaseAllowance"; spender: Address; delta: Amount }
  | { type: "decreaseAllowance"; spender: Address; delta: Amount }
  | { type: "mint"; value: Amount }
  | { type: "burn"; value: Amount };

export type CommandType = Command["type"];

/* caller (already authenticated by the host) + call */
export type Input = [Address, Command];

export type LedgerOptions = {
  /** Reject the zero address as sender, recipient or spender. Off by default. */
  rejectZeroAddress?: boolean;
};

export type Outcome =
  | { ok: true; state: LedgerState; events: LedgerEvent[] }
  | { ok: false; state: LedgerState; error: LedgerError };
