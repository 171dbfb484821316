#!/usr/bin/env node
import { buildProgram } from "./program";

buildProgram()
  .parseAsync()
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
