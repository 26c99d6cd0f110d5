#!/usr/bin/env node
/**
 * @custody/demo — Terminal walkthrough.
 *
 * Drives a bounded custody vault (capacity 1000, withdraw limit 100)
 * through the reference scenarios, then shows a failed transfer being
 * rolled back and a re-entrant call being refused.
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import type { Amount, Principal } from "@custody/types";
import { describeRejection } from "@custody/types";
import { CustodyError, Ledger, formatAmount } from "@custody/ledger";
import { InMemoryEventStore } from "@custody/event-store";
import { CustodyVault } from "@custody/vault";
import type { TransferFn } from "@custody/vault";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                  BOUNDED CUSTODY DEMO                    ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        capacity 1000 · withdraw limit 100 per call        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function refused(msg: string): void {
  console.log(chalk.red("    ✗ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.yellow(short));
}

/**
 * Run an operation and print its receipt or rejection.
 * Anything other than a CustodyError is a real failure and propagates.
 */
async function attempt(label: string, op: () => Promise<{ balance: Amount }>): Promise<void> {
  try {
    const receipt = await op();
    ok(`${label} → balance ${formatAmount(receipt.balance)}`);
  } catch (error) {
    if (!(error instanceof CustodyError)) {
      throw error;
    }
    refused(`${label} → ${chalk.bold(error.code)}`);
    info("reason", describeRejection(error.rejection));
  }
}

function showTotals(ledger: Ledger, principals: readonly Principal[]): void {
  const totals = ledger.totals();
  for (const p of principals) {
    info(`balance(${p})`, formatAmount(ledger.balanceOf(p)));
  }
  info("totalDeposited", formatAmount(totals.totalDeposited));
  info("totalWithdrawn", formatAmount(totals.totalWithdrawn));
  info("held", formatAmount(ledger.heldBalance()));
}

const TOTAL_STEPS = 10;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const ledger = new Ledger({
    capacityLimit: 1000n,
    perOperationWithdrawLimit: 100n,
    owner: "owner",
  });
  ok("Ledger initialized (capacity basis: held)");

  const eventStore = new InMemoryEventStore();
  ok("EventStore initialized (in-memory, hash-chained)");

  let transportDown = false;
  let reenter: (() => Promise<unknown>) | undefined;
  const transfer: TransferFn = async (to, amount) => {
    if (reenter !== undefined) {
      await reenter();
    }
    if (transportDown) {
      throw new Error(`transport unavailable for ${to} (${formatAmount(amount)})`);
    }
  };

  const vault = new CustodyVault({ ledger, eventStore, transfer });
  ok(`Vault ready (phase: ${vault.phase})`);

  await sleep(DELAY_MS);

  // ─── Steps 2-7: Reference scenarios ─────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Deposit zero");
  await attempt("deposit(alice, 0)", () => vault.deposit("alice", 0n));
  showTotals(ledger, ["alice"]);
  await sleep(DELAY_MS);

  stepHeader(3, TOTAL_STEPS, "Deposit 600");
  await attempt("deposit(alice, 600)", () => vault.deposit("alice", 600n));
  showTotals(ledger, ["alice"]);
  await sleep(DELAY_MS);

  stepHeader(4, TOTAL_STEPS, "Deposit past capacity");
  await attempt("deposit(bob, 500)", () => vault.deposit("bob", 500n));
  info("remainingCapacity", formatAmount(vault.remainingCapacity()));
  await sleep(DELAY_MS);

  stepHeader(5, TOTAL_STEPS, "Withdraw past the per-call limit");
  await attempt("withdraw(alice, 150)", () => vault.withdraw("alice", 150n));
  await sleep(DELAY_MS);

  stepHeader(6, TOTAL_STEPS, "Withdraw 100");
  await attempt("withdraw(alice, 100)", () => vault.withdraw("alice", 100n));
  showTotals(ledger, ["alice"]);
  await sleep(DELAY_MS);

  stepHeader(7, TOTAL_STEPS, "Deposit 400");
  await attempt("deposit(bob, 400)", () => vault.deposit("bob", 400n));
  showTotals(ledger, ["alice", "bob"]);
  await sleep(DELAY_MS);

  // ─── Step 8: Transfer failure ───────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Transfer failure rolls back");

  transportDown = true;
  await attempt("withdraw(bob, 50)", () => vault.withdraw("bob", 50n));
  transportDown = false;

  const fault = vault.lastFault;
  if (fault !== undefined) {
    info("fault", `${fault.principal} ${formatAmount(fault.amount)} at ${fault.occurredAt}`);
  }
  showTotals(ledger, ["bob"]);
  ok(`Vault phase back to ${vault.phase}`);

  await sleep(DELAY_MS);

  // ─── Step 9: Re-entry ───────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Re-entry from inside a transfer");

  let inner: unknown;
  reenter = async () => {
    try {
      await vault.deposit("mallory", 1n);
    } catch (error) {
      inner = error;
    }
  };
  await attempt("withdraw(bob, 10)", () => vault.withdraw("bob", 10n));
  reenter = undefined;

  if (inner instanceof CustodyError) {
    refused(`nested deposit(mallory, 1) → ${chalk.bold(inner.code)}`);
  }
  info("balance(mallory)", formatAmount(ledger.balanceOf("mallory")));

  await sleep(DELAY_MS);

  // ─── Step 10: Audit ─────────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Audit");

  const stats = vault.globalStats();
  info("deposit ops", String(stats.totalDepositOperations));
  info("withdraw ops", String(stats.totalWithdrawOperations));
  info("held", formatAmount(stats.currentHeldBalance));

  const report = ledger.checkInvariants();
  if (report.valid) {
    ok("Ledger invariants hold");
  } else {
    for (const v of report.violations) {
      refused(`${v.invariant}: ${v.detail}`);
    }
  }

  const integrity = eventStore.verifyIntegrity();
  const events = eventStore.readAll();
  info("events", String(events.length));
  for (const se of events) {
    console.log(
      chalk.gray("    ") +
        chalk.dim(JSON.stringify({ type: se.event.type, stream: se.streamId, hash: `${se.hash.slice(0, 12)}...` })),
    );
  }
  const last = events.at(-1);
  if (last !== undefined) {
    hashLine("chain head", last.hash);
  }
  if (integrity.valid) {
    ok(`Hash chain verified through position ${integrity.lastVerifiedPosition}`);
  } else {
    refused(`Hash chain broken after position ${integrity.lastVerifiedPosition}`);
  }

  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
