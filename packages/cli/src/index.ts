#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./program.js";

// Global error handlers: an unhandled failure still exits non-zero
process.on("unhandledRejection", (reason) => {
  console.error("[plansmith] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[plansmith] Uncaught exception:", err);
  process.exit(1);
});

process.exitCode = await runCli(process.argv.slice(2));
