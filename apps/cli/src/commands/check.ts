import { readFile } from "node:fs/promises";
import { TestRunResultsSchema, ValidationError } from "@callgate/shared";
import type { TestRunResults } from "@callgate/shared";
import { evaluateResults } from "../checker.js";
import { printReport } from "../output.js";
import { createClient, createContext, reportFailure } from "./context.js";
import type { GlobalOptions } from "./context.js";

export interface CheckOptions extends GlobalOptions {
  input?: string;
  json?: boolean;
  minTestPassRate?: number;
  minAssertionPassRate?: number;
}

export async function readResultsFile(path: string): Promise<TestRunResults> {
  const raw = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Failed to parse results file ${path}: ${msg}`);
  }
  const parsed = TestRunResultsSchema.safeParse(json);
  if (!parsed.success) {
    throw ValidationError.fromZod(`Results file ${path} is not a test run result`, parsed.error);
  }
  return parsed.data;
}

export async function checkCommand(runId: string, options: CheckOptions): Promise<number> {
  const { config, logger } = createContext(options);

  try {
    let results: TestRunResults;
    if (options.input) {
      results = await readResultsFile(options.input);
      if (results.id !== runId) {
        throw new ValidationError(`Results file ${options.input} is for run ${results.id}, not ${runId}`);
      }
    } else {
      results = await createClient(config).getResults(runId);
    }

    const report = evaluateResults(results, {
      minTestPassRate: options.minTestPassRate ?? config.minTestPassRate,
      minAssertionPassRate: options.minAssertionPassRate ?? config.minAssertionPassRate,
    });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report, results, config.uiBaseUrl);
    }
    return report.passed ? 0 : 1;
  } catch (err) {
    return reportFailure(logger, err);
  }
}
