#!/usr/bin/env tsx

import color from "picocolors";
import { main } from "./cli/main";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
