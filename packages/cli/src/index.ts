#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[autosweep] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[autosweep] Uncaught exception:", err);
  process.exit(1);
});

await createProgram().parseAsync(process.argv);
