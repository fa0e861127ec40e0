import "dotenv/config";
import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { parseRate, parseSeconds, reportFailure } from "./commands/context.js";
import { runCommand } from "./commands/run.js";
import { waitCommand } from "./commands/wait.js";
import { createLogger } from "./logger.js";

function action<A extends unknown[]>(fn: (...args: A) => Promise<number>) {
  return async (...args: A): Promise<void> => {
    try {
      process.exitCode = await fn(...args);
    } catch (err) {
      // Reached when configuration can't be loaded, before a command has its own logger.
      process.exitCode = reportFailure(createLogger(), err);
    }
  };
}

const program = new Command();

program
  .name("callgate")
  .description("callgate — gate CI on voice agent test runs")
  .version("0.1.0");

program
  .command("run")
  .description("Create a test run and print its id")
  .option("--agent-id <id>", "Agent to test (default: AGENT_ID)")
  .option("--phone-numbers <list>", "Comma-separated E.164 numbers (default: PHONE_NUMBERS)")
  .option("--tag-ids <list>", "Comma-separated tag ids (default: TAG_IDS)")
  .option("--test-case-ids <list>", "Comma-separated test case ids (default: TEST_CASE_IDS)")
  .option("--persona <text>", "Persona override for every test case")
  .option("--scenario <text>", "Scenario override for every test case")
  .option("-v, --verbose", "Debug logging")
  .action(action(runCommand));

program
  .command("wait")
  .description("Poll a test run until it finishes")
  .argument("<runId>", "Test run id")
  .option("--timeout <seconds>", "Give up after this many seconds (default: TIMEOUT_SECONDS)", parseSeconds)
  .option("--interval <seconds>", "Seconds between polls (default: POLL_INTERVAL_SECONDS)", parseSeconds)
  .option("-o, --output <file>", "Write the final results to a JSON file")
  .option("-v, --verbose", "Debug logging")
  .action(action(waitCommand));

program
  .command("check")
  .description("Check a finished test run against pass-rate thresholds")
  .argument("<runId>", "Test run id")
  .option("-i, --input <file>", "Read results from a file written by `wait --output`")
  .option("--json", "Print the report as JSON on stdout")
  .option("--min-test-pass-rate <rate>", "0-1 (default: MIN_TEST_PASS_RATE)", parseRate)
  .option("--min-assertion-pass-rate <rate>", "0-1 (default: MIN_ASSERTION_PASS_RATE)", parseRate)
  .option("-v, --verbose", "Debug logging")
  .action(action(checkCommand));

await program.parseAsync();
