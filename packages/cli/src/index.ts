/**
 * @payadvance/cli — Salary advance form in the terminal.
 *
 * Collects the request from flags, asks the PayAdvance service for a
 * decision and prints it. Run through tsx (`npm run form`).
 */

import { writeFile } from "node:fs/promises";
import chalk from "chalk";
import { run } from "./run.js";

run(process.argv.slice(2), {
  env: process.env,
  // eslint-disable-next-line no-console
  write: (line) => console.log(line),
  writeFile: (path, data) => writeFile(path, data, "utf8"),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(chalk.red("\n  Form failed:"), err);
    process.exitCode = 1;
  });
