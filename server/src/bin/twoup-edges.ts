#!/usr/bin/env node
import { runEdgesCli } from "../cli.js";

runEdgesCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("[Impose] Fatal:", error);
    process.exit(1);
  },
);
