import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes, hexToBytes } from "@noble/hashes/utils";
import * as rlp from "rlp";
import {
  allowanceStorageKey,
  balanceStorageKey,
  encMetadata,
  sortedAllowances,
  sortedBalances,
} from "../codec/rlp";
import type { Hex, LedgerState } from "./types";

/* ── Merkle helper (odd leaf is paired with itself) ─────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concatBytes(left, right)));
  }
  return merkle(next);
};

const leaf = (key: Hex, value: bigint): Uint8Array =>
  keccak_256(rlp.encode([hexToBytes(key.slice(2)), value]));

/* ── storage roots ───────────────────────────────────────── */
export const computeBalancesRoot = (s: LedgerState): Uint8Array =>
  merkle(sortedBalances(s).map(([owner, v]) => leaf(balanceStorageKey(owner), v)));

export const computeAllowancesRoot = (s: LedgerState): Uint8Array =>
  merkle(
    sortedAllowances(s).map(([owner, spender, v]) =>
      leaf(allowanceStorageKey(owner, spender), v),
    ),
  );

/* ── ledger commitment: keccak(rlp(supply, balancesRoot, allowancesRoot, metaHash)) ── */
export const computeStateRoot = (s: LedgerState): Hex =>
  `0x${bytesToHex(
    keccak_256(
      rlp.encode([
        s.totalSupply,
        computeBalancesRoot(s),
        computeAllowancesRoot(s),
        keccak_256(encMetadata(s)),
      ]),
    ),
  )}`;
