/**
 * @settle/cli — Entry point.
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  });
