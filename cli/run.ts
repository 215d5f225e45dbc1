#!/usr/bin/env -S npx tsx
// cli/run.ts
import { main } from "./main";

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  }
);
