import { loadConfig, type Config } from "./config";
import { makeLogger } from "./logging";
import { LedgerRuntime, type Listener } from "./core/runtime";
import type { Address } from "./core/types";

export * from "./core/types";
export * from "./core/errors";
export * from "./core/ledger";
export { U128_MAX, isAmount, saturatingAdd, saturatingSub } from "./core/amount";
export { computeStateRoot } from "./core/hash";
export { LedgerRuntime, unwrap, type CallResult, type Listener, type RuntimeOptions } from "./core/runtime";
export { allowanceStorageKey, balanceStorageKey, decSnapshot, encSnapshot } from "./codec/rlp";
export { addressSchema, amountSchema, commandSchema, inputSchema } from "./schema";
export { asAddress, isAddress, ZERO_ADDRESS } from "./types/brands";
export { loadConfig, type Config } from "./config";
export { makeLogger, silentLogger, type ILogger } from "./logging";

/** Builds a runtime from environment configuration (see `loadConfig`). */
export const startLedger = (
  creator: Address,
  config: Config = loadConfig(),
  listeners: Listener[] = [],
): LedgerRuntime =>
  LedgerRuntime.create(creator, config.token, {
    ...config.ledger,
    logger: makeLogger(config.logLevel, { pretty: config.prettyLogs }),
    listeners,
  });
