import { describe, it, expect } from "vitest";
import { LedgerRuntime } from "./core/runtime";
import { silentLogger } from "./logging";
import { asAddress } from "./types/brands";

const C = asAddress("0x00000000000000000000000000000000000000c0");
const A = asAddress("0x00000000000000000000000000000000000000a0");
const B = asAddress("0x00000000000000000000000000000000000000b0");
const D = asAddress("0x00000000000000000000000000000000000000d0");
const X = asAddress("0x00000000000000000000000000000000000000e0");

/* one ledger carried through the whole walk-through */
describe("token ledger walk-through", () => {
  const ledger = LedgerRuntime.create(
    C,
    { initialSupply: 1000n, name: "Demo", symbol: "DMO", decimals: 2 },
    { logger: silentLogger },
  );

  it("1: credits the whole supply to the creator", () => {
    expect(ledger.balanceOf(C)).toBe(1000n);
    expect(ledger.totalSupply()).toBe(1000n);
  });

  it("2: transfers 400 from C to A", () => {
    expect(ledger.transfer(C, A, 400n).ok).toBe(true);
    expect(ledger.balanceOf(C)).toBe(600n);
    expect(ledger.balanceOf(A)).toBe(400n);
  });

  it("3: refuses to transfer 700 out of 600", () => {
    expect(ledger.transfer(C, A, 700n)).toEqual({
      ok: false,
      error: { kind: "InsufficientBalance" },
    });
    expect(ledger.balanceOf(C)).toBe(600n);
    expect(ledger.balanceOf(A)).toBe(400n);
  });

  it("4: B spends 50 of A's 100 allowance for D", () => {
    expect(ledger.approve(A, B, 100n).ok).toBe(true);
    expect(ledger.transferFrom(B, A, D, 50n).ok).toBe(true);
    expect(ledger.allowance(A, B)).toBe(50n);
    expect(ledger.balanceOf(A)).toBe(350n);
    expect(ledger.balanceOf(D)).toBe(50n);
  });

  it("5: B cannot spend 200 against an allowance of 50", () => {
    expect(ledger.transferFrom(B, A, D, 200n)).toEqual({
      ok: false,
      error: { kind: "InsufficientAllowance" },
    });
    expect(ledger.balanceOf(A)).toBe(350n);
    expect(ledger.balanceOf(D)).toBe(50n);
    expect(ledger.allowance(A, B)).toBe(50n);
  });

  it("6: mint then burn of 10 restores balance and supply", () => {
    const balance = ledger.balanceOf(X);
    const supply = ledger.totalSupply();
    expect(ledger.mint(X, 10n).ok).toBe(true);
    expect(ledger.totalSupply()).toBe(supply + 10n);
    expect(ledger.burn(X, 10n).ok).toBe(true);
    expect(ledger.balanceOf(X)).toBe(balance);
    expect(ledger.totalSupply()).toBe(supply);
  });
});
