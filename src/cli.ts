#!/usr/bin/env node
import { createProgram } from "./cli/program";

void createProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exitCode = 1;
  });
