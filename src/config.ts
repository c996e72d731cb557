import {
  optional,
  object,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
} from "valibot";
import type pino from "pino";
import { ConfigError } from "./core/errors";
import { DEFAULT_PARAMS } from "./core/ledger";
import { amountSchema, decimalsSchema } from "./schema";
import type { LedgerOptions, LedgerParams } from "./core/types";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly pino.LevelWithSilent[];

const boolFlag = pipe(
  picklist(["true", "false", "1", "0"], "expected true/false"),
  transform((s) => s === "true" || s === "1"),
);

const envSchema = object({
  LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: optional(boolFlag, "false"),
  TOKEN_INITIAL_SUPPLY: optional(amountSchema, String(DEFAULT_PARAMS.initialSupply)),
  TOKEN_NAME: optional(string(), DEFAULT_PARAMS.name ?? undefined),
  TOKEN_SYMBOL: optional(string(), DEFAULT_PARAMS.symbol ?? undefined),
  TOKEN_DECIMALS: optional(
    pipe(string(), regex(/^[0-9]+$/), transform(Number), decimalsSchema),
    String(DEFAULT_PARAMS.decimals),
  ),
  LEDGER_REJECT_ZERO_ADDRESS: optional(boolFlag, "false"),
});

export type Config = {
  logLevel: pino.LevelWithSilent;
  prettyLogs: boolean;
  token: LedgerParams;
  ledger: LedgerOptions;
};

/**
 * Reads ledger configuration from environment variables.
 * An empty TOKEN_NAME / TOKEN_SYMBOL means "no name" / "no symbol".
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = safeParse(envSchema, env);
  if (!parsed.success) throw new ConfigError(parsed.issues);
  const e = parsed.output;
  return {
    logLevel: e.LOG_LEVEL,
    prettyLogs: e.LOG_PRETTY,
    token: {
      initialSupply: e.TOKEN_INITIAL_SUPPLY,
      name: e.TOKEN_NAME === "" ? null : e.TOKEN_NAME ?? null,
      symbol: e.TOKEN_SYMBOL === "" ? null : e.TOKEN_SYMBOL ?? null,
      decimals: e.TOKEN_DECIMALS,
    },
    ledger: { rejectZeroAddress: e.LEDGER_REJECT_ZERO_ADDRESS },
  };
};
