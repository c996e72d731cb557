// RLP encoders for storage keys and whole-ledger snapshots.

import * as rlp from "rlp";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { asAddress } from "../types/brands";
import { isAmount } from "../core/amount";
import { pairKey } from "../core/ledger";
import { SnapshotDecodeError } from "../core/errors";
import type {
  Address,
  AllowanceKey,
  Amount,
  Hex,
  LedgerState,
} from "../core/types";

const SNAPSHOT_VERSION = 1n;

/* — helpers — */
const addrToBytes = (a: Address): Uint8Array => hexToBytes(a.slice(2));
const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

const bufToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt("0x" + bytesToHex(b));

// Option<string> as a 0- or 1-element list
const encOpt = (s: string | null): rlp.Input => (s === null ? [] : [utf8ToBytes(s)]);

const asBytes = (v: unknown, what: string): Uint8Array => {
  if (!(v instanceof Uint8Array)) throw new SnapshotDecodeError(`${what}: expected bytes`);
  return v;
};

const asList = (v: unknown, what: string): unknown[] => {
  if (!Array.isArray(v)) throw new SnapshotDecodeError(`${what}: expected list`);
  return v;
};

const decAddress = (v: unknown, what: string): Address => {
  const b = asBytes(v, what);
  if (b.length !== 20) throw new SnapshotDecodeError(`${what}: expected 20-byte address`);
  return asAddress(toHex(b));
};

const decAmount = (v: unknown, what: string): Amount => {
  const b = asBytes(v, what);
  // canonical RLP integers carry no leading zero byte
  if (b.length > 0 && b[0] === 0) throw new SnapshotDecodeError(`${what}: non-canonical integer`);
  const n = bufToBn(b);
  if (!isAmount(n)) throw new SnapshotDecodeError(`${what}: out of u128 range`);
  return n;
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

const decOpt = (v: unknown, what: string): string | null => {
  const l = asList(v, what);
  if (l.length === 0) return null;
  if (l.length !== 1) throw new SnapshotDecodeError(`${what}: malformed option`);
  const raw = asBytes(l[0], what);
  try {
    return utf8.decode(raw);
  } catch {
    throw new SnapshotDecodeError(`${what}: invalid utf-8`);
  }
};

const asTuple = (v: unknown, size: number, what: string): unknown[] => {
  const l = asList(v, what);
  if (l.length !== size) throw new SnapshotDecodeError(`${what}: expected ${size} fields`);
  return l;
};

/* — storage keys — */
export const balanceStorageKey = (owner: Address): Hex =>
  toHex(rlp.encode(["balance", addrToBytes(owner)]));

export const allowanceStorageKey = (owner: Address, spender: Address): Hex =>
  toHex(rlp.encode(["allowance", addrToBytes(owner), addrToBytes(spender)]));

/* — sorted entry lists (map iteration order is insertion order) — */
export const sortedBalances = (s: LedgerState): [Address, Amount][] =>
  [...s.balances.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

export const sortedAllowances = (
  s: LedgerState,
): [Address, Address, Amount][] =>
  [...s.allowances.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => {
      const [owner, spender] = splitPairKey(key);
      return [owner, spender, value];
    });

const splitPairKey = (key: AllowanceKey): [Address, Address] => {
  const [owner, spender] = key.split(":");
  return [asAddress(owner), asAddress(spender)];
};

/* — metadata — */
export const encMetadata = (s: LedgerState): Uint8Array =>
  rlp.encode([
    encOpt(s.metadata.name),
    encOpt(s.metadata.symbol),
    s.metadata.decimals,
  ]);

/* — snapshot — */
export const encSnapshot = (s: LedgerState): Uint8Array =>
  rlp.encode([
    SNAPSHOT_VERSION,
    s.totalSupply,
    sortedBalances(s).map(([owner, v]) => [addrToBytes(owner), v]),
    sortedAllowances(s).map(([owner, spender, v]) => [
      addrToBytes(owner),
      addrToBytes(spender),
      v,
    ]),
    encOpt(s.metadata.name),
    encOpt(s.metadata.symbol),
    s.metadata.decimals,
  ]);

/**
 * @throws SnapshotDecodeError on malformed bytes, zero or duplicate entries,
 * or a supply larger than the balances
 */
export const decSnapshot = (bytes: Uint8Array): LedgerState => {
  let decoded: unknown;
  try {
    decoded = rlp.decode(bytes);
  } catch (e) {
    throw new SnapshotDecodeError(
      `not valid RLP: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  const fields = asList(decoded, "snapshot");
  if (fields.length !== 7) throw new SnapshotDecodeError("snapshot: expected 7 fields");
  const [version, supply, balList, allowList, name, symbol, decimals] = fields;

  if (decAmount(version, "version") !== SNAPSHOT_VERSION)
    throw new SnapshotDecodeError("snapshot: unsupported version");

  const balances = new Map<Address, Amount>();
  for (const entry of asList(balList, "balances")) {
    const [owner, value] = asTuple(entry, 2, "balance entry");
    const a = decAddress(owner, "balance owner");
    const v = decAmount(value, "balance value");
    if (v === 0n) throw new SnapshotDecodeError(`zero balance stored for ${a}`);
    if (balances.has(a)) throw new SnapshotDecodeError(`duplicate balance for ${a}`);
    balances.set(a, v);
  }

  const allowances = new Map<AllowanceKey, Amount>();
  for (const entry of asList(allowList, "allowances")) {
    const [owner, spender, value] = asTuple(entry, 3, "allowance entry");
    const key = pairKey(
      decAddress(owner, "allowance owner"),
      decAddress(spender, "allowance spender"),
    );
    const v = decAmount(value, "allowance value");
    if (v === 0n) throw new SnapshotDecodeError(`zero allowance stored for ${key}`);
    if (allowances.has(key)) throw new SnapshotDecodeError(`duplicate allowance for ${key}`);
    allowances.set(key, v);
  }

  // saturating arithmetic can leave the balances above the supply, never below
  const totalSupply = decAmount(supply, "totalSupply");
  let sum = 0n;
  for (const v of balances.values()) sum += v;
  if (totalSupply > sum)
    throw new SnapshotDecodeError(`totalSupply ${totalSupply} exceeds sum of balances ${sum}`);

  const d = Number(decAmount(decimals, "decimals"));
  if (d > 255) throw new SnapshotDecodeError("decimals: out of range");

  return {
    totalSupply,
    balances,
    allowances,
    metadata: {
      name: decOpt(name, "name"),
      symbol: decOpt(symbol, "symbol"),
      decimals: d,
    },
  };
};
