import { describe, it, expect } from "vitest";
import * as rlp from "rlp";
import { bytesToHex } from "@noble/hashes/utils";
import {
  allowanceStorageKey,
  balanceStorageKey,
  decSnapshot,
  encSnapshot,
} from "../src/codec/rlp";
import { computeStateRoot, merkle } from "../src/core/hash";
import { SnapshotDecodeError } from "../src/core/errors";
import { alice, bob, creator } from "./helpers/accounts";
import { genesis, must } from "./helpers/ledger";

const addr = (a: string) => Uint8Array.from(Buffer.from(a.slice(2), "hex"));

describe("Storage keys", () => {
  it("balance key is rlp(['balance', owner])", () => {
    const key = balanceStorageKey(alice);
    expect(key).toBe("0x" + bytesToHex(rlp.encode(["balance", addr(alice)])));
  });

  it("allowance key depends on the order of the pair", () => {
    expect(allowanceStorageKey(alice, bob)).not.toBe(allowanceStorageKey(bob, alice));
    expect(allowanceStorageKey(alice, bob)).toBe(
      "0x" + bytesToHex(rlp.encode(["allowance", addr(alice), addr(bob)])),
    );
  });
});

describe("Snapshot codec", () => {
  it("decodes what it encodes", () => {
    let s = genesis(creator);
    s = must(s, creator, { type: "transfer", to: alice, value: 10n });
    s = must(s, alice, { type: "approve", spender: bob, value: 4n });

    const back = decSnapshot(encSnapshot(s));

    expect(back.totalSupply).toBe(1000n);
    expect([...back.balances.entries()]).toEqual([
      [alice, 10n],
      [creator, 990n],
    ]);
    expect([...back.allowances.entries()]).toEqual([[`${alice}:${bob}`, 4n]]);
    expect(back.metadata).toEqual({ name: "Test", symbol: "TST", decimals: 6 });
  });

  it("keeps absent metadata absent", () => {
    const s = { ...genesis(creator), metadata: { name: null, symbol: null, decimals: 0 } };
    expect(decSnapshot(encSnapshot(s)).metadata).toEqual({ name: null, symbol: null, decimals: 0 });
  });

  it("rejects bytes that are not RLP", () => {
    expect(() => decSnapshot(Uint8Array.from([0xf8]))).toThrow(SnapshotDecodeError);
  });

  it("rejects a stored zero balance", () => {
    const bytes = rlp.encode([1n, 0n, [[addr(alice), 0n]], [], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow(`zero balance stored for ${alice}`);
  });

  it("rejects duplicate balances", () => {
    const bytes = rlp.encode([1n, 2n, [[addr(alice), 1n], [addr(alice), 1n]], [], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow(`duplicate balance for ${alice}`);
  });

  it("rejects a supply above the sum of balances", () => {
    const bytes = rlp.encode([1n, 2000n, [[addr(alice), 1000n]], [], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow("totalSupply 2000 exceeds sum of balances 1000");
  });

  it("accepts balances above the supply", () => {
    const bytes = rlp.encode([1n, 5n, [[addr(alice), 1000n]], [], [], [], 0]);
    const s = decSnapshot(bytes);
    expect(s.totalSupply).toBe(5n);
    expect(s.balances.get(alice)).toBe(1000n);
  });

  it("rejects a balance entry with extra fields", () => {
    const bytes = rlp.encode([1n, 1n, [[addr(alice), 1n, 1n]], [], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow("balance entry: expected 2 fields");
  });

  it("rejects an allowance entry with a missing field", () => {
    const bytes = rlp.encode([1n, 1n, [[addr(alice), 1n]], [[addr(alice), 1n]], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow("allowance entry: expected 3 fields");
  });

  it("rejects a name that is not utf-8", () => {
    const bytes = rlp.encode([1n, 1n, [[addr(alice), 1n]], [], [Uint8Array.from([0xff])], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow("name: invalid utf-8");
  });

  it("rejects an unknown version", () => {
    const bytes = rlp.encode([2n, 0n, [], [], [], [], 0]);
    expect(() => decSnapshot(bytes)).toThrow("snapshot: unsupported version");
  });
});

describe("State root", () => {
  it("is independent of insertion order", () => {
    const a = must(
      must(genesis(creator), creator, { type: "transfer", to: alice, value: 1n }),
      creator,
      { type: "transfer", to: bob, value: 1n },
    );
    const b = must(
      must(genesis(creator), creator, { type: "transfer", to: bob, value: 1n }),
      creator,
      { type: "transfer", to: alice, value: 1n },
    );
    expect(computeStateRoot(a)).toBe(computeStateRoot(b));
  });

  it("changes when a balance changes", () => {
    const s = genesis(creator);
    const next = must(s, creator, { type: "transfer", to: alice, value: 1n });
    expect(computeStateRoot(next)).not.toBe(computeStateRoot(s));
  });

  it("merkle of a single leaf is the leaf", () => {
    const leaf = new Uint8Array(32).fill(7);
    expect(merkle([leaf])).toBe(leaf);
  });
});
