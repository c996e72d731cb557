import type { BaseIssue } from "valibot";

/* ── ledger-level failures (returned, never thrown by the core) ── */
export type LedgerError =
  | { kind: "InsufficientBalance" }
  | { kind: "InsufficientAllowance" }
  | { kind: "ZeroSenderAddress" }
  | { kind: "ZeroRecipientAddress" }
  | { kind: "Custom"; message: string }
  | { kind: "SafeTransferCheckFailed"; message: string };

export type LedgerErrorKind = LedgerError["kind"];

export const insufficientBalance: LedgerError = { kind: "InsufficientBalance" };
export const insufficientAllowance: LedgerError = { kind: "InsufficientAllowance" };
export const zeroSender: LedgerError = { kind: "ZeroSenderAddress" };
export const zeroRecipient: LedgerError = { kind: "ZeroRecipientAddress" };

export const describeLedgerError = (e: LedgerError): string => {
  switch (e.kind) {
    case "Custom":
    case "SafeTransferCheckFailed":
      return `${e.kind}: ${e.message}`;
    default:
      return e.kind;
  }
};

/* ── thrown errors ─────────────────────────────────────────── */

/** Thrown by `unwrap` when a call was rejected by the ledger. */
export class LedgerCallError extends Error {
  constructor(readonly error: LedgerError) {
    super(describeLedgerError(error));
    this.name = "LedgerCallError";
  }
}

export class InvalidInputError extends Error {
  constructor(readonly issues: readonly BaseIssue<unknown>[]) {
    super(`invalid ledger input: ${issues.map((i) => i.message).join("; ")}`);
    this.name = "InvalidInputError";
  }
}

export class SnapshotDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnapshotDecodeError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly BaseIssue<unknown>[]) {
    super(`invalid configuration: ${issues.map((i) => i.message).join("; ")}`);
    this.name = "ConfigError";
  }
}
