#!/usr/bin/env node
import { runNc } from "./nc";

void runNc(process.argv.slice(2), { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr }).then(
  (code) => {
    // Accepted connections may still hold the event loop open; exit like the command would.
    process.exit(code);
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  }
);
