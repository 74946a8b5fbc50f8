/**
 * @payadvance/cli — Form parsing.
 *
 * Turns command-line flags into an AdvanceRequest. Every problem is
 * collected and reported together, keyed by flag.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import type { AdvanceRequest, PayFrequency } from "@payadvance/types";
import { isPayFrequency, PAY_FREQUENCIES } from "@payadvance/types";

export const DEFAULT_BACKEND_URL = "http://localhost:8000";

export const USAGE = [
  "Usage: payadvance --salary <amount> --frequency <Weekly|Bi-Weekly|Monthly|Annually>",
  "                  --advance <amount>",
  "                  [--loan-amount <amount> --interest-rate <percent> --loan-term <months>]",
  "                  [--amortization] [--export <dir>] [--url <base>]",
].join("\n");

// =============================================================================
// Schema
// =============================================================================

function amount(flag: string) {
  return z
    .string({ required_error: `--${flag} is required` })
    .pipe(z.coerce.number().finite().min(0));
}

export const FormSchema = z.object({
  salary: z
    .string({ required_error: "--salary is required" })
    .pipe(z.coerce.number().finite().positive()),
  frequency: z.custom<PayFrequency>((v) => isPayFrequency(v), {
    message: `must be one of ${PAY_FREQUENCIES.join(", ")}`,
  }),
  advance: amount("advance"),
  "loan-amount": amount("loan-amount").optional(),
  "interest-rate": z.string().pipe(z.coerce.number().finite().min(0).max(100)).optional(),
  "loan-term": z.string().pipe(z.coerce.number().int().min(1)).optional(),
  amortization: z.boolean().default(false),
  export: z.string().min(1).default("."),
  url: z.string().url(),
});

export type FormValues = z.infer<typeof FormSchema>;

// =============================================================================
// Parsing
// =============================================================================

export class FormError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(problems.join("; "));
    this.name = "FormError";
    this.problems = problems;
  }
}

export type FormInput =
  | { readonly help: true }
  | {
      readonly help: false;
      readonly request: AdvanceRequest;
      /** Directory the CSV schedule is written to */
      readonly exportDir: string;
      readonly baseUrl: string;
    };

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        salary: { type: "string" },
        frequency: { type: "string" },
        advance: { type: "string" },
        "loan-amount": { type: "string" },
        "interest-rate": { type: "string" },
        "loan-term": { type: "string" },
        amortization: { type: "boolean" },
        export: { type: "string" },
        url: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err: unknown) {
    throw new FormError([err instanceof Error ? err.message : String(err)]);
  }
}

/**
 * @throws FormError listing every invalid or missing flag
 */
export function parseForm(
  argv: readonly string[],
  env: Record<string, string | undefined>,
): FormInput {
  const { help, ...flags } = readFlags(argv);
  if (help === true) {
    return { help: true };
  }

  const result = FormSchema.safeParse({
    ...flags,
    url: flags.url ?? env.BACKEND_URL ?? DEFAULT_BACKEND_URL,
  });
  if (!result.success) {
    throw new FormError(
      result.error.issues.map((issue) => {
        const flag = issue.path.join(".");
        return issue.message.startsWith("--") ? issue.message : `--${flag}: ${issue.message}`;
      }),
    );
  }

  const values = result.data;
  return {
    help: false,
    request: {
      grossSalary: values.salary,
      payFrequency: values.frequency,
      advanceAmount: values.advance,
      loanAmount: values["loan-amount"],
      interestRate: values["interest-rate"],
      loanTerm: values["loan-term"],
      includeAmortization: values.amortization,
    },
    exportDir: values.export,
    baseUrl: values.url,
  };
}
