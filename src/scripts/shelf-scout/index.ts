#!/usr/bin/env node
import { runCli } from "./cli.js";

runCli(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  },
);
