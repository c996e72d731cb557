import { safeParse } from "valibot";
import { type ILogger, makeLogger } from "../logging";
import { inputSchema } from "../schema";
import { decSnapshot, encSnapshot } from "../codec/rlp";
import { computeStateRoot } from "./hash";
import { InvalidInputError, LedgerCallError, type LedgerError } from "./errors";
import {
  DEFAULT_PARAMS,
  allowance,
  applyCommand,
  balanceOf,
  createLedger,
  tokenDecimals,
  tokenName,
  tokenSymbol,
  totalSupply,
} from "./ledger";
import type {
  Address,
  Amount,
  Command,
  Hex,
  LedgerEvent,
  LedgerOptions,
  LedgerParams,
  LedgerState,
} from "./types";

export type CallResult =
  | { ok: true; events: LedgerEvent[] }
  | { ok: false; error: LedgerError };

export type Listener = (event: LedgerEvent) => void;

export type RuntimeOptions = LedgerOptions & {
  logger?: ILogger;
  /* registered before construction so they see the genesis Transfer */
  listeners?: Listener[];
};

export const unwrap = (r: CallResult): LedgerEvent[] => {
  if (!r.ok) throw new LedgerCallError(r.error);
  return r.events;
};

/* ──────────── runtime shell ──────────── */

/**
 * Holds the current ledger state for the host and serialises calls into it.
 * Every call runs to completion before the next one; a rejected call leaves
 * the state reference untouched and notifies nobody.
 */
export class LedgerRuntime {
  private state: LedgerState;
  private readonly log: ILogger;
  private readonly opts: LedgerOptions;
  private readonly listeners = new Set<Listener>();
  private seq = 0;

  constructor(
    state: LedgerState,
    opts: RuntimeOptions = {},
    genesis: LedgerEvent[] = [],
  ) {
    this.state = state;
    this.log = opts.logger ?? makeLogger("info");
    this.opts = { rejectZeroAddress: opts.rejectZeroAddress };
    opts.listeners?.forEach((l) => this.listeners.add(l));
    this.notify(genesis);
  }

  /** Constructs a fresh ledger with the whole supply credited to `creator`. */
  static create(
    creator: Address,
    params: LedgerParams = DEFAULT_PARAMS,
    opts: RuntimeOptions = {},
  ): LedgerRuntime {
    const { state, events } = createLedger(creator, params);
    const rt = new LedgerRuntime(state, opts, events);
    rt.log.info(
      {
        creator,
        supply: params.initialSupply.toString(),
        symbol: params.symbol,
        decimals: params.decimals,
      },
      "ledger created",
    );
    return rt;
  }

  /** Rebuilds a runtime from `snapshot()` bytes; no genesis event is emitted. */
  static restore(bytes: Uint8Array, opts: RuntimeOptions = {}): LedgerRuntime {
    const rt = new LedgerRuntime(decSnapshot(bytes), opts);
    rt.log.info({ root: rt.stateRoot() }, "ledger restored");
    return rt;
  }

  /* ── queries ── */
  totalSupply(): Amount {
    return totalSupply(this.state);
  }
  balanceOf(owner: Address): Amount {
    return balanceOf(this.state, owner);
  }
  allowance(owner: Address, spender: Address): Amount {
    return allowance(this.state, owner, spender);
  }
  tokenName(): string | null {
    return tokenName(this.state);
  }
  tokenSymbol(): string | null {
    return tokenSymbol(this.state);
  }
  tokenDecimals(): number {
    return tokenDecimals(this.state);
  }

  /* ── mutations ── */
  transfer(caller: Address, to: Address, value: Amount): CallResult {
    return this.execute(caller, { type: "transfer", to, value });
  }
  transferFrom(caller: Address, from: Address, to: Address, value: Amount): CallResult {
    return this.execute(caller, { type: "transferFrom", from, to, value });
  }
  approve(caller: Address, spender: Address, value: Amount): CallResult {
    return this.execute(caller, { type: "approve", spender, value });
  }
  increaseAllowance(caller: Address, spender: Address, delta: Amount): CallResult {
    return this.execute(caller, { type: "increaseAllowance", spender, delta });
  }
  decreaseAllowance(caller: Address, spender: Address, delta: Amount): CallResult {
    return this.execute(caller, { type: "decreaseAllowance", spender, delta });
  }
  mint(caller: Address, value: Amount): CallResult {
    return this.execute(caller, { type: "mint", value });
  }
  burn(caller: Address, value: Amount): CallResult {
    return this.execute(caller, { type: "burn", value });
  }

  execute(caller: Address, cmd: Command): CallResult {
    const out = applyCommand(this.state, caller, cmd, this.opts);
    if (!out.ok) {
      this.log.debug({ caller, type: cmd.type, error: out.error.kind }, "call rejected");
      return { ok: false, error: out.error };
    }
    this.state = out.state;
    this.seq++;
    this.log.debug(
      { seq: this.seq, caller, type: cmd.type, events: out.events.length },
      "commit",
    );
    this.notify(out.events);
    return { ok: true, events: out.events };
  }

  /**
   * Entry point for untrusted wire input `[caller, command]`.
   * @throws InvalidInputError when the input does not match the schema
   */
  dispatch(raw: unknown): CallResult {
    const parsed = safeParse(inputSchema, raw);
    if (!parsed.success) {
      const err = new InvalidInputError(parsed.issues);
      this.log.error({ err }, "invalid input");
      throw err;
    }
    const [caller, cmd] = parsed.output;
    return this.execute(caller, cmd);
  }

  /* ── observers ── */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // the call has already committed; a failing listener must not hide that
  private notify(events: LedgerEvent[]) {
    for (const e of events)
      for (const l of this.listeners) {
        try {
          l(e);
        } catch (err) {
          this.log.error({ err, event: e.type }, "listener failed");
        }
      }
  }

  /* ── commitment / export ── */
  stateRoot(): Hex {
    return computeStateRoot(this.state);
  }

  snapshot(): Uint8Array {
    return encSnapshot(this.state);
  }

  /** Number of committed mutating calls since construction or restore. */
  get committed(): number {
    return this.seq;
  }

  /** Read-only view of the current state. */
  get current(): LedgerState {
    return this.state;
  }
}
