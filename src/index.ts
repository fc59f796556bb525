#!/usr/bin/env node

import color from "picocolors";
import { run } from "./cli/run";

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
