#!/usr/bin/env node
import { buildProgram } from "./cli.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error("[fleetrun] fatal", err);
    process.exit(1);
  });
