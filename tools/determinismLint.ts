#!/usr/bin/env -S npx tsx

import { fileURLToPath } from "node:url";
import { findDeterminismViolations } from "./determinism.ts";

const coreDir = fileURLToPath(new URL("../core", import.meta.url));
const byFile = findDeterminismViolations(coreDir);

console.log("\nDeterminism check:");
if (byFile.size === 0) {
  console.log("No banned strings found.");
} else {
  for (const [file, bannedStrings] of byFile.entries()) {
    console.log("core/" + file);
    for (const bannedString of bannedStrings) {
      console.log(`  ${bannedString}`);
    }
  }
  process.exit(1);
}
