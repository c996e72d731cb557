import { ZERO_ADDRESS } from "../types/brands";
import { assertAmount, saturatingAdd, saturatingSub } from "./amount";
import {
  insufficientAllowance,
  insufficientBalance,
  zeroRecipient,
  zeroSender,
  type LedgerError,
} from "./errors";
import type {
  Address,
  AllowanceKey,
  Amount,
  Command,
  LedgerEvent,
  LedgerOptions,
  LedgerParams,
  LedgerState,
  Outcome,
} from "./types";

/* values of the reference default constructor */
export const DEFAULT_PARAMS: LedgerParams = {
  initialSupply: 1_000_000n,
  name: "MyToken",
  symbol: "MTK",
  decimals: 18,
};

export const pairKey = (owner: Address, spender: Address): AllowanceKey =>
  `${owner}:${spender}`;

/* ── queries ─────────────────────────────────────────────── */
export const totalSupply = (s: LedgerState): Amount => s.totalSupply;

export const balanceOf = (s: LedgerState, owner: Address): Amount =>
  s.balances.get(owner) ?? 0n;

export const allowance = (
  s: LedgerState,
  owner: Address,
  spender: Address,
): Amount => s.allowances.get(pairKey(owner, spender)) ?? 0n;

export const tokenName = (s: LedgerState): string | null => s.metadata.name;
export const tokenSymbol = (s: LedgerState): string | null => s.metadata.symbol;
export const tokenDecimals = (s: LedgerState): number => s.metadata.decimals;

export const sumBalances = (s: LedgerState): Amount => {
  let total = 0n;
  for (const v of s.balances.values()) total += v;
  return total;
};

/* ── helpers ─────────────────────────────────────────────── */

// absent means zero, so zero is never written
const put = <K>(m: Map<K, Amount>, key: K, value: Amount) => {
  if (value === 0n) m.delete(key);
  else m.set(key, value);
};

const ok = (state: LedgerState, events: LedgerEvent[]): Outcome => ({
  ok: true,
  state,
  events,
});

const fail = (state: LedgerState, error: LedgerError): Outcome => ({
  ok: false,
  state,
  error,
});

export const assertDecimals = (d: number): number => {
  if (!Number.isInteger(d) || d < 0 || d > 255)
    throw new RangeError(`decimals must be an integer in 0..255, got ${d}`);
  return d;
};

const commandAmount = (cmd: Command): Amount =>
  "delta" in cmd ? cmd.delta : cmd.value;

/* Zero-address rules, applied only when LedgerOptions.rejectZeroAddress is set. */
const zeroAddressError = (caller: Address, cmd: Command): LedgerError | null => {
  switch (cmd.type) {
    case "transfer":
      if (caller === ZERO_ADDRESS) return zeroSender;
      return cmd.to === ZERO_ADDRESS ? zeroRecipient : null;
    case "transferFrom":
      if (cmd.from === ZERO_ADDRESS) return zeroSender;
      return cmd.to === ZERO_ADDRESS ? zeroRecipient : null;
    case "approve":
    case "increaseAllowance":
    case "decreaseAllowance":
      if (caller === ZERO_ADDRESS) return zeroSender;
      return cmd.spender === ZERO_ADDRESS ? zeroRecipient : null;
    case "mint":
      return caller === ZERO_ADDRESS ? zeroRecipient : null;
    case "burn":
      return caller === ZERO_ADDRESS ? zeroSender : null;
  }
};

/*
 * Debit is written before the credit is read, so a self-transfer nets to
 * zero instead of minting `value`.
 */
const moveBalance = (
  s: LedgerState,
  from: Address,
  to: Address,
  value: Amount,
): Outcome => {
  const fromBalance = balanceOf(s, from);
  if (fromBalance < value) return fail(s, insufficientBalance);

  const balances = new Map(s.balances);
  put(balances, from, fromBalance - value);
  put(balances, to, saturatingAdd(balances.get(to) ?? 0n, value));

  return ok({ ...s, balances }, [{ type: "Transfer", from, to, value }]);
};

const writeAllowance = (
  s: LedgerState,
  owner: Address,
  spender: Address,
  value: Amount,
): Outcome => {
  const allowances = new Map(s.allowances);
  put(allowances, pairKey(owner, spender), value);
  return ok({ ...s, allowances }, [{ type: "Approval", owner, spender, value }]);
};

/* ── genesis ─────────────────────────────────────────────── */
export const createLedger = (
  creator: Address,
  params: LedgerParams = DEFAULT_PARAMS,
): { state: LedgerState; events: LedgerEvent[] } => {
  const supply = assertAmount(params.initialSupply, "initialSupply");
  const balances = new Map<Address, Amount>();
  put(balances, creator, supply);

  const state: LedgerState = {
    totalSupply: supply,
    balances,
    allowances: new Map(),
    metadata: {
      name: params.name,
      symbol: params.symbol,
      decimals: assertDecimals(params.decimals),
    },
  };
  return {
    state,
    events: [{ type: "Transfer", from: null, to: creator, value: supply }],
  };
};

/* ── command-level reducer ───────────────────────────────── */

/**
 * Applies one call made by `caller`. On failure the returned `state` is the
 * same object that was passed in.
 *
 * @throws RangeError if the command carries an amount outside u128
 */
export const applyCommand = (
  s: LedgerState,
  caller: Address,
  cmd: Command,
  opts: LedgerOptions = {},
): Outcome => {
  assertAmount(commandAmount(cmd), cmd.type);

  if (opts.rejectZeroAddress) {
    const err = zeroAddressError(caller, cmd);
    if (err) return fail(s, err);
  }

  switch (cmd.type) {
    case "transfer":
      return moveBalance(s, caller, cmd.to, cmd.value);

    case "transferFrom": {
      const current = allowance(s, cmd.from, caller);
      if (current < cmd.value) return fail(s, insufficientAllowance);

      const moved = moveBalance(s, cmd.from, cmd.to, cmd.value);
      if (!moved.ok) return moved;

      // only touched once the balance move has succeeded
      const allowances = new Map(moved.state.allowances);
      put(allowances, pairKey(cmd.from, caller), saturatingSub(current, cmd.value));
      return ok({ ...moved.state, allowances }, moved.events);
    }

    case "approve":
      return writeAllowance(s, caller, cmd.spender, cmd.value);

    case "increaseAllowance": {
      const current = allowance(s, caller, cmd.spender);
      return writeAllowance(s, caller, cmd.spender, saturatingAdd(current, cmd.delta));
    }

    case "decreaseAllowance": {
      const current = allowance(s, caller, cmd.spender);
      if (current < cmd.delta) return fail(s, insufficientAllowance);
      return writeAllowance(s, caller, cmd.spender, current - cmd.delta);
    }

    case "mint": {
      const balances = new Map(s.balances);
      put(balances, caller, saturatingAdd(balanceOf(s, caller), cmd.value));
      return ok(
        {
          ...s,
          balances,
          totalSupply: saturatingAdd(s.totalSupply, cmd.value),
        },
        [{ type: "Transfer", from: null, to: caller, value: cmd.value }],
      );
    }

    case "burn": {
      const balance = balanceOf(s, caller);
      if (balance < cmd.value) return fail(s, insufficientBalance);
      const balances = new Map(s.balances);
      put(balances, caller, balance - cmd.value);
      return ok(
        // supply may sit below the balance after a saturated mint
        { ...s, balances, totalSupply: saturatingSub(s.totalSupply, cmd.value) },
        [{ type: "Transfer", from: caller, to: null, value: cmd.value }],
      );
    }
  }
};
