#!/usr/bin/env node
import { runGutterCli } from "../cli.js";

runGutterCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("[Impose] Fatal:", error);
    process.exit(1);
  },
);
