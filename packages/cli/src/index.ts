#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { errorMessage } from "@tabrunner/schemas";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[tabrunner] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[tabrunner] Uncaught exception:", err);
  process.exit(1);
});

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  // Commander has already printed its own message.
  if (err instanceof CommanderError) process.exit(err.exitCode);
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
