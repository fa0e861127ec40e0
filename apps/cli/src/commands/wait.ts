import { writeFile } from "node:fs/promises";
import ora from "ora";
import { getTestRunUrl } from "@callgate/sdk";
import { pollRun } from "../poller.js";
import { createClient, createContext, reportFailure } from "./context.js";
import type { GlobalOptions } from "./context.js";

export interface WaitOptions extends GlobalOptions {
  /** Seconds */
  timeout?: number;
  /** Seconds */
  interval?: number;
  output?: string;
}

export async function waitCommand(runId: string, options: WaitOptions): Promise<number> {
  const { config, logger } = createContext(options);
  const timeoutMs = options.timeout !== undefined ? options.timeout * 1000 : config.timeoutMs;
  const intervalMs = options.interval !== undefined ? options.interval * 1000 : config.pollIntervalMs;

  logger.info(`Waiting for test run to complete: ${runId}`);
  logger.info(`View in UI: ${getTestRunUrl(config.uiBaseUrl, runId)}`);
  logger.info(`Timeout: ${Math.round(timeoutMs / 1000)} seconds`);

  const spinner = ora({ text: "Waiting for results...", stream: process.stderr }).start();

  try {
    const client = createClient(config);
    const status = await pollRun(client, runId, {
      intervalMs,
      timeoutMs,
      logger,
      onStatus: (s, pollCount) => {
        spinner.text = `Test run status: ${s} (poll #${pollCount})`;
      },
      onProgress: (total, counts) => {
        const summary = Object.entries(counts)
          .map(([s, n]) => `${s}=${n}`)
          .join(" ");
        spinner.text = `Running: ${total} test cases (${summary})`;
      },
    });
    spinner.succeed(`Test run completed with status: ${status}`);

    if (options.output) {
      const results = await client.getResults(runId);
      await writeFile(options.output, `${JSON.stringify(results, null, 2)}\n`, "utf-8");
      logger.info(`Results written to ${options.output}`);
    }
    return 0;
  } catch (err) {
    spinner.fail("Test run did not complete");
    return reportFailure(logger, err);
  }
}
