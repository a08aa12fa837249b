#!/usr/bin/env node
/**
 * @custody/demo — CLI walkthrough.
 *
 * Runs the custody vault through its scenarios in your terminal:
 * deposit -> withdraw -> overdraft -> withdrawal switch ->
 * re-entrancy attack on the secure vault -> same attack on the
 * vulnerable vault -> profile registry
 *
 * Uses real domain packages directly.
 */

import chalk from "chalk";
import { ZodError } from "zod";
import { InMemoryEventStore } from "@custody/event-store";
import { loadConfig } from "./config.js";
import type { DemoConfig } from "./config.js";
import { attachEventLogger, createLogger } from "./logger.js";
import {
  PARTIES,
  runAttackScenario,
  runBasicFlow,
  runRegistryScenario,
  runToggleScenario,
} from "./scenarios.js";
import type { AttackScenarioResult } from "./scenarios.js";

// =============================================================================
// Helpers
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                  CUSTODY VAULT DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Checks, effects, then interactions              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function printAttack(result: AttackScenarioResult): void {
  const { report } = result;
  info("stake", report.stake.toString());
  info("pool before", report.poolBefore.toString());
  info("pool after", report.poolAfter.toString());
  info("re-entries", String(report.reentries));
  info("stolen", report.stolen.toString());
  info("victim is owed", result.victimBalance.toString());
  if (report.rejections.length > 0) {
    info("nested refusals", report.rejections.join(", "));
  }
}

const TOTAL_STEPS = 6;

// =============================================================================
// Demo
// =============================================================================

async function run(config: DemoConfig): Promise<void> {
  const logger = createLogger(config);
  const events = new InMemoryEventStore();
  attachEventLogger(events, logger);

  banner();
  console.log(chalk.gray("  Walk-through of a re-entrancy-safe custody vault."));
  console.log(chalk.gray("  Every step uses real domain packages — no mocks.\n"));
  logger.info({ victimDeposit: config.VICTIM_DEPOSIT.toString(), stake: config.ATTACK_STAKE.toString() }, "demo starting");

  // ─── Step 1: Deposit and withdraw ───────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Deposit and withdraw");
  const basic = runBasicFlow(config, events);
  ok(`Alice deposited; balance ${basic.afterDeposit.balance.toString()}, total ${basic.afterDeposit.total.toString()}`);
  ok(`Alice withdrew ${basic.withdrawal.amount.toString()}; balance ${basic.withdrawal.remaining.toString()}`);
  info("phases", basic.withdrawal.phases.join(" → "));
  info("overdraft", basic.overdraft ?? "accepted");
  await sleep(config.STEP_DELAY_MS);

  // ─── Step 2: Withdrawal switch ───────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Withdrawal switch");
  const toggle = runToggleScenario(config, events);
  ok(`Withdrawals off: ${toggle.whileDisabled ?? "accepted"}`);
  ok(`Withdrawals on again: withdrew ${toggle.afterReenable.amount.toString()}`);
  await sleep(config.STEP_DELAY_MS);

  // ─── Step 3: Attack the secure vault ────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Re-entrancy vs SecureVault");
  const secure = runAttackScenario("secure", config, events);
  printAttack(secure);
  if (secure.report.drained) {
    warn("Secure vault was drained");
  } else {
    ok("Nested withdrawal refused; pool intact");
  }
  await sleep(config.STEP_DELAY_MS);

  // ─── Step 4: Attack the vulnerable vault ────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Re-entrancy vs VulnerableVault");
  const vulnerable = runAttackScenario("vulnerable", config, events);
  printAttack(vulnerable);
  if (vulnerable.report.drained) {
    warn(`Pool drained: ledger owes ${vulnerable.ledgerTotal.toString()}, pool holds ${vulnerable.report.poolAfter.toString()}`);
  } else {
    ok("Vulnerable vault held");
  }
  await sleep(config.STEP_DELAY_MS);

  // ─── Step 5: Registry ────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Profile registry");
  const profile = runRegistryScenario(events);
  ok(`Registered ${profile.name} (${profile.party}), age ${String(profile.age)}`);
  await sleep(config.STEP_DELAY_MS);

  // ─── Step 6: Summary ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Summary");
  console.log();
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(events.globalPosition())));
  console.log(chalk.white("    Secure vault:        ") + chalk.green.bold(`stolen ${secure.report.stolen.toString()}`));
  console.log(chalk.white("    Vulnerable vault:    ") + chalk.red.bold(`stolen ${vulnerable.report.stolen.toString()}`));
  console.log(chalk.white("    Vault address:       ") + chalk.yellow(PARTIES.vault));
  console.log();
  console.log(chalk.gray("    Debit first, transfer second."));
  console.log();
}

let config: DemoConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ZodError) {
    console.error(chalk.red("\n  Invalid configuration:"));
    for (const issue of err.issues) {
      console.error(chalk.red(`    ${issue.path.join(".")}: ${issue.message}`));
    }
    process.exit(1);
  }
  throw err;
}

run(config).catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
