/**
 * @payadvance/cli — Form runner.
 *
 * parse flags → computeAdvance → render → (export schedule → write CSV)
 *
 * The export is a second call made only after the decision is shown;
 * if it fails, the decision stands and is not requested again.
 */

import { join } from "node:path";
import chalk from "chalk";
import { PayAdvanceClient, PayAdvanceError } from "@payadvance/sdk";
import type { AdvanceDecision, AdvanceRequest, ScheduleExport } from "@payadvance/types";
import { FormError, parseForm, USAGE } from "./form.js";
import type { FormInput } from "./form.js";
import { banner, fail, ok, renderDecision, warn } from "./render.js";

/** The slice of PayAdvanceClient the form uses. */
export interface AdvanceApi {
  computeAdvance(request: AdvanceRequest): Promise<AdvanceDecision>;
  exportSchedule(request: AdvanceRequest): Promise<ScheduleExport | undefined>;
}

export interface RunDeps {
  readonly env: Record<string, string | undefined>;
  readonly write: (line: string) => void;
  readonly writeFile: (path: string, data: string) => Promise<void>;
  readonly createClient?: ((baseUrl: string) => AdvanceApi) | undefined;
}

function describeError(err: unknown): string[] {
  if (err instanceof PayAdvanceError) {
    const lines = [fail(`${err.code}: ${err.message}`)];
    const issues = issuesOf(err.details);
    for (const issue of issues) {
      lines.push(chalk.red(`      ${issue}`));
    }
    return lines;
  }
  return [fail(err instanceof Error ? err.message : String(err))];
}

function issuesOf(details: unknown): string[] {
  if (details === null || typeof details !== "object" || !("issues" in details)) {
    return [];
  }
  const issues = details.issues;
  if (!Array.isArray(issues)) {
    return [];
  }
  return issues.map((issue: unknown) => {
    if (issue !== null && typeof issue === "object" && "path" in issue && "message" in issue) {
      return `${String(issue.path)}: ${String(issue.message)}`;
    }
    return String(issue);
  });
}

/**
 * Run the form once. Resolves to the process exit code.
 */
export async function run(argv: readonly string[], deps: RunDeps): Promise<number> {
  const { write } = deps;

  let form: FormInput;
  try {
    form = parseForm(argv, deps.env);
  } catch (err: unknown) {
    if (err instanceof FormError) {
      write(chalk.red("\n  Invalid input:"));
      for (const problem of err.problems) {
        write(fail(problem));
      }
      write("");
      write(chalk.gray(USAGE));
      return 1;
    }
    throw err;
  }

  if (form.help) {
    write(USAGE);
    return 0;
  }

  const client =
    deps.createClient?.(form.baseUrl) ?? new PayAdvanceClient({ baseUrl: form.baseUrl });

  for (const line of banner()) {
    write(line);
  }

  let decision: AdvanceDecision;
  try {
    decision = await client.computeAdvance(form.request);
  } catch (err: unknown) {
    write(chalk.red("\n  Request failed:"));
    for (const line of describeError(err)) {
      write(line);
    }
    return 1;
  }

  for (const line of renderDecision(decision)) {
    write(line);
  }

  if (decision.amortizationSchedule === undefined) {
    return 0;
  }

  write("");
  try {
    const exported = await client.exportSchedule(form.request);
    if (exported === undefined) {
      write(warn("No schedule to export"));
      return 0;
    }
    const path = join(form.exportDir, exported.filename);
    await deps.writeFile(path, exported.csvData);
    write(ok(`Schedule written to ${path}`));
    return 0;
  } catch (err: unknown) {
    write(chalk.red("  Export failed:"));
    for (const line of describeError(err)) {
      write(line);
    }
    return 1;
  }
}
