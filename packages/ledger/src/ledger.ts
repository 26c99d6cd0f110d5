/**
 * @custody/ledger — Core Ledger class.
 *
 * Bounded custody ledger for a single value unit. Holds per-account
 * balances under a global capacity limit and a per-withdrawal limit.
 *
 * API surface:
 * - validateDeposit() / applyDeposit() — admit and record a deposit
 * - validateWithdraw() / applyWithdraw() — admit and record a withdrawal
 * - balanceOf(), remainingCapacity(), globalStats(), historyOf() — queries
 * - checkInvariants() — full audit of the accounting guarantees
 * - captureCheckpoint() / restoreCheckpoint() — all-or-nothing boundary
 * - snapshot() / fromSnapshot() — serialize and replay
 *
 * Validation is pure. Apply steps re-check admissibility and throw if
 * called out of order; they never leave a half-applied operation.
 */

import type {
  AccountHistory,
  AccountState,
  Amount,
  GlobalStats,
  Principal,
  ValidationResult,
} from "@custody/types";
import { isCapacityBasis } from "@custody/types";
import { AccountBook, assertPrincipal } from "./accounts.js";
import {
  assertAmount,
  checkedAdd,
  checkedSub,
  formatAmount,
  parseAmount,
} from "./amount-math.js";
import { auditInvariants } from "./invariants.js";
import type {
  InvariantReport,
  LedgerCheckpoint,
  LedgerConfig,
  LedgerOperation,
  LedgerSnapshot,
  LedgerTotals,
  OperationKind,
  OperationReceipt,
  ResolvedLedgerConfig,
} from "./types.js";
import { CustodyError, LedgerError } from "./types.js";

const ADMITTED: ValidationResult = { ok: true };

export class Ledger {
  private readonly _config: ResolvedLedgerConfig;
  private readonly _book: AccountBook = new AccountBook();
  private readonly _journal: LedgerOperation[] = [];
  private _totalDeposited: Amount = 0n;
  private _totalWithdrawn: Amount = 0n;
  private _totalDepositOperations = 0;
  private _totalWithdrawOperations = 0;

  constructor(config: LedgerConfig) {
    this._config = resolveConfig(config);
  }

  get config(): ResolvedLedgerConfig {
    return this._config;
  }

  // ─── Deposit ─────────────────────────────────────────────────────────

  /**
   * Decide whether a deposit of `amount` is admissible.
   *
   * Rejections, in order:
   * 1. ZERO_AMOUNT
   * 2. CAPACITY_EXCEEDED — admitting it would push the capacity basis
   *    ("held" balance or "lifetime" deposits) above capacityLimit
   */
  validateDeposit(amount: Amount): ValidationResult {
    assertAmount(amount);

    if (amount === 0n) {
      return { ok: false, rejection: { code: "ZERO_AMOUNT" } };
    }

    const remaining = this.remainingCapacity();
    if (amount > remaining) {
      return {
        ok: false,
        rejection: {
          code: "CAPACITY_EXCEEDED",
          attempted: amount,
          remainingCapacity: remaining,
        },
      };
    }

    return ADMITTED;
  }

  /**
   * Credit `amount` to `principal`. The account is created if needed.
   */
  applyDeposit(principal: Principal, amount: Amount): OperationReceipt {
    assertPrincipal(principal);
    this._assertAdmitted("deposit", this.validateDeposit(amount));

    const record = this._book.open(principal);
    record.balance = checkedAdd(record.balance, amount);
    record.depositCount += 1;
    record.deposits.push(amount);

    this._totalDeposited = checkedAdd(this._totalDeposited, amount);
    this._totalDepositOperations += 1;

    return this._journalize("deposit", principal, amount, record.balance);
  }

  // ─── Withdraw ────────────────────────────────────────────────────────

  /**
   * Decide whether `principal` may withdraw `amount`.
   *
   * Rejections, in order:
   * 1. ZERO_AMOUNT
   * 2. WITHDRAW_LIMIT_EXCEEDED — amount > perOperationWithdrawLimit
   * 3. INSUFFICIENT_BALANCE — amount > the principal's balance
   */
  validateWithdraw(principal: Principal, amount: Amount): ValidationResult {
    assertPrincipal(principal);
    assertAmount(amount);

    if (amount === 0n) {
      return { ok: false, rejection: { code: "ZERO_AMOUNT" } };
    }

    const limit = this._config.perOperationWithdrawLimit;
    if (amount > limit) {
      return {
        ok: false,
        rejection: { code: "WITHDRAW_LIMIT_EXCEEDED", requested: amount, limit },
      };
    }

    const available = this.balanceOf(principal);
    if (amount > available) {
      return {
        ok: false,
        rejection: { code: "INSUFFICIENT_BALANCE", available, requested: amount },
      };
    }

    return ADMITTED;
  }

  /**
   * Debit `amount` from `principal`. Must complete before any
   * outbound transfer of the same funds is attempted.
   */
  applyWithdraw(principal: Principal, amount: Amount): OperationReceipt {
    this._assertAdmitted("withdraw", this.validateWithdraw(principal, amount));

    const record = this._book.open(principal);
    record.balance = checkedSub(record.balance, amount);
    record.withdrawCount += 1;
    record.withdrawals.push(amount);

    this._totalWithdrawn = checkedAdd(this._totalWithdrawn, amount);
    this._totalWithdrawOperations += 1;

    return this._journalize("withdraw", principal, amount, record.balance);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  balanceOf(principal: Principal): Amount {
    return this._book.peek(principal)?.balance ?? 0n;
  }

  getAccount(principal: Principal): AccountState {
    return this._book.state(principal);
  }

  principals(): readonly Principal[] {
    return this._book.principals();
  }

  /**
   * Value currently held: totalDeposited − totalWithdrawn.
   */
  heldBalance(): Amount {
    if (this._totalWithdrawn > this._totalDeposited) {
      throw new LedgerError(
        "INVARIANT_VIOLATION",
        `Withdrawals (${this._totalWithdrawn.toString()}) exceed deposits (${this._totalDeposited.toString()})`,
      );
    }
    return this._totalDeposited - this._totalWithdrawn;
  }

  /**
   * How much more may be deposited right now.
   *
   * Under "held": capacityLimit − held balance.
   * Under "lifetime": capacityLimit − totalDeposited.
   */
  remainingCapacity(): Amount {
    const used = this._config.capacityBasis === "held"
      ? this.heldBalance()
      : this._totalDeposited;

    if (used > this._config.capacityLimit) {
      throw new LedgerError(
        "INVARIANT_VIOLATION",
        `Capacity basis ${used.toString()} exceeds limit ${this._config.capacityLimit.toString()}`,
      );
    }
    return this._config.capacityLimit - used;
  }

  globalStats(): GlobalStats {
    return {
      totalDepositOperations: this._totalDepositOperations,
      totalWithdrawOperations: this._totalWithdrawOperations,
      currentHeldBalance: this.heldBalance(),
    };
  }

  totals(): LedgerTotals {
    return {
      totalDeposited: this._totalDeposited,
      totalWithdrawn: this._totalWithdrawn,
      totalDepositOperations: this._totalDepositOperations,
      totalWithdrawOperations: this._totalWithdrawOperations,
    };
  }

  /**
   * Deposit and withdrawal history of `account`.
   *
   * Readable by the account itself, or by the configured owner for
   * any account. Anyone else gets NOT_AUTHORIZED.
   */
  historyOf(caller: Principal, account: Principal): AccountHistory {
    const owner = this._config.owner;
    if (caller !== account && (owner === undefined || caller !== owner)) {
      throw new CustodyError({ code: "NOT_AUTHORIZED", caller, account });
    }
    return this._book.history(account);
  }

  checkInvariants(): InvariantReport {
    return auditInvariants({
      config: this._config,
      book: this._book,
      totals: this.totals(),
      journal: this._journal,
    });
  }

  // ─── Checkpoints ─────────────────────────────────────────────────────

  /**
   * Record enough state to undo every operation on `principal`
   * applied after this call.
   */
  captureCheckpoint(principal: Principal): LedgerCheckpoint {
    assertPrincipal(principal);
    const record = this._book.peek(principal);
    return {
      principal,
      journalLength: this._journal.length,
      totals: this.totals(),
      account: record !== undefined
        ? {
            balance: record.balance,
            depositCount: record.depositCount,
            withdrawCount: record.withdrawCount,
            depositHistoryLength: record.deposits.length,
            withdrawHistoryLength: record.withdrawals.length,
          }
        : undefined,
    };
  }

  /**
   * Undo every operation applied since `checkpoint` was captured, as if
   * they never happened. Only operations on the checkpoint's principal
   * can be undone; anything else throws PRECONDITION_FAILED untouched.
   */
  restoreCheckpoint(checkpoint: LedgerCheckpoint): void {
    if (checkpoint.journalLength > this._journal.length) {
      throw new LedgerError(
        "PRECONDITION_FAILED",
        `Checkpoint is ahead of the journal (${checkpoint.journalLength} > ${this._journal.length})`,
      );
    }

    const undone = this._journal.slice(checkpoint.journalLength);
    const foreign = undone.find((op) => op.principal !== checkpoint.principal);
    if (foreign !== undefined) {
      throw new LedgerError(
        "PRECONDITION_FAILED",
        `Cannot restore checkpoint for "${checkpoint.principal}": operation #${foreign.sequence} touched "${foreign.principal}"`,
      );
    }

    const saved = checkpoint.account;
    if (saved === undefined) {
      this._book.forget(checkpoint.principal);
    } else {
      const record = this._book.open(checkpoint.principal);
      record.balance = saved.balance;
      record.depositCount = saved.depositCount;
      record.withdrawCount = saved.withdrawCount;
      record.deposits.length = saved.depositHistoryLength;
      record.withdrawals.length = saved.withdrawHistoryLength;
    }

    this._journal.length = checkpoint.journalLength;
    this._totalDeposited = checkpoint.totals.totalDeposited;
    this._totalWithdrawn = checkpoint.totals.totalWithdrawn;
    this._totalDepositOperations = checkpoint.totals.totalDepositOperations;
    this._totalWithdrawOperations = checkpoint.totals.totalWithdrawOperations;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with Ledger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    const config = this._config;
    return {
      version: 1,
      config: {
        capacityLimit: formatAmount(config.capacityLimit),
        perOperationWithdrawLimit: formatAmount(config.perOperationWithdrawLimit),
        strictWithdrawLimit: config.strictWithdrawLimit,
        capacityBasis: config.capacityBasis,
        ...(config.owner !== undefined ? { owner: config.owner } : {}),
      },
      operations: this._journal.map((op) => ({
        kind: op.kind,
        principal: op.principal,
        amount: formatAmount(op.amount),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Replays every operation through validation, so a snapshot that
   * would break a limit is refused with INVALID_SNAPSHOT.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new Ledger({
      capacityLimit: parseAmount(snapshot.config.capacityLimit),
      perOperationWithdrawLimit: parseAmount(snapshot.config.perOperationWithdrawLimit),
      strictWithdrawLimit: snapshot.config.strictWithdrawLimit,
      capacityBasis: snapshot.config.capacityBasis,
      owner: snapshot.config.owner,
    });

    snapshot.operations.forEach((op, index) => {
      const amount = parseAmount(op.amount);
      const verdict = op.kind === "deposit"
        ? ledger.validateDeposit(amount)
        : ledger.validateWithdraw(op.principal, amount);

      if (!verdict.ok) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Operation ${index + 1} (${op.kind} ${op.amount} by "${op.principal}") is not admissible: ${verdict.rejection.code}`,
        );
      }

      if (op.kind === "deposit") {
        ledger.applyDeposit(op.principal, amount);
      } else {
        ledger.applyWithdraw(op.principal, amount);
      }
    });

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertAdmitted(kind: OperationKind, verdict: ValidationResult): void {
    if (!verdict.ok) {
      throw new LedgerError(
        "PRECONDITION_FAILED",
        `apply ${kind} called on an inadmissible operation (${verdict.rejection.code})`,
      );
    }
  }

  private _journalize(
    kind: OperationKind,
    principal: Principal,
    amount: Amount,
    balance: Amount,
  ): OperationReceipt {
    const operation: LedgerOperation = {
      sequence: this._journal.length + 1,
      kind,
      principal,
      amount,
    };
    this._journal.push(operation);
    return { ...operation, balance };
  }
}

/**
 * Apply defaults and enforce the construction-time rules:
 * - capacityLimit > 0
 * - perOperationWithdrawLimit > 0
 * - strict mode: perOperationWithdrawLimit < capacityLimit
 */
export function resolveConfig(config: LedgerConfig): ResolvedLedgerConfig {
  assertAmount(config.capacityLimit, "capacityLimit");
  assertAmount(config.perOperationWithdrawLimit, "perOperationWithdrawLimit");

  if (config.capacityLimit === 0n) {
    throw new LedgerError("INVALID_CONFIG", "capacityLimit must be greater than zero");
  }
  if (config.perOperationWithdrawLimit === 0n) {
    throw new LedgerError("INVALID_CONFIG", "perOperationWithdrawLimit must be greater than zero");
  }

  const strictWithdrawLimit = config.strictWithdrawLimit ?? true;
  if (strictWithdrawLimit && config.perOperationWithdrawLimit >= config.capacityLimit) {
    throw new LedgerError(
      "INVALID_CONFIG",
      `perOperationWithdrawLimit (${config.perOperationWithdrawLimit.toString()}) must be below capacityLimit (${config.capacityLimit.toString()})`,
    );
  }

  const capacityBasis = config.capacityBasis ?? "held";
  if (!isCapacityBasis(capacityBasis)) {
    throw new LedgerError("INVALID_CONFIG", `Unknown capacity basis: "${String(capacityBasis)}"`);
  }

  if (config.owner !== undefined) {
    assertPrincipal(config.owner);
  }

  return {
    capacityLimit: config.capacityLimit,
    perOperationWithdrawLimit: config.perOperationWithdrawLimit,
    strictWithdrawLimit,
    capacityBasis,
    owner: config.owner,
  };
}
