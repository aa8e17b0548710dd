#!/usr/bin/env node
/**
 * @souk/demo — Terminal walkthrough of a full trade.
 *
 * Uses the real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import type { Reporter } from "./scenario.js";
import { SCENARIO_STEPS, runTradeScenario } from "./scenario.js";

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                        SOUK DEMO                         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("             Escrowed peer-to-peer trading                ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function terminalReporter(): Reporter {
  let step = 0;
  return {
    step(title) {
      step++;
      const prefix = chalk.cyan.bold(`  Step ${String(step)}/${String(SCENARIO_STEPS)}`);
      const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
      console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(message) {
      console.log(chalk.green("    ✓ ") + chalk.white(message));
    },
    info(label, value) {
      console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
    },
  };
}

banner();

try {
  const { audit, ledger } = runTradeScenario(terminalReporter(), Math.floor(Date.now() / 1000));
  const balanced = audit.totalDeposited === ledger.custodyBalance() && audit.totalLocked === 0n;

  console.log();
  console.log(
    balanced
      ? chalk.green.bold("  Custody reconciled: every deposit accounted for.")
      : chalk.red.bold("  Custody mismatch."),
  );
  console.log();
  process.exitCode = balanced ? 0 : 1;
} catch (err: unknown) {
  console.error(chalk.red.bold("\n  Demo failed:"), err);
  process.exitCode = 1;
}
