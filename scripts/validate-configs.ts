#!/usr/bin/env tsx
// ─── Validate Configs ──────────────────────────────────────────────
// CLI script that validates all .game.json files against the schema.
// Exits 0 if all pass, 1 if any fail.

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { formatIssues, safeParseGameConfig } from "../packages/schema/src/index";

const CONFIG_DIR = fileURLToPath(new URL("../config/", import.meta.url));

async function main(): Promise<void> {
  const entries = await readdir(CONFIG_DIR);
  const files = entries.filter((f) => f.endsWith(".game.json")).sort();

  if (files.length === 0) {
    console.error("No .game.json files found in config/");
    process.exit(1);
  }

  console.log(`\nValidating ${files.length} config(s)...\n`);

  let failed = 0;

  for (const file of files) {
    const raw = await readFile(join(CONFIG_DIR, file), "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.error(`  ❌ ${file} — invalid JSON`);
      if (err instanceof Error) {
        console.error(`     ${err.message}`);
      }
      failed++;
      continue;
    }

    const result = safeParseGameConfig(parsed);

    if (result.success) {
      const seats = result.data.players.map((p) => `${p.name} (${p.policy})`).join(", ");
      console.log(`  ✅ ${file}: ${seats}`);
    } else {
      console.error(`  ❌ ${file}`);
      for (const line of formatIssues(result.error)) {
        console.error(`     ${line}`);
      }
      failed++;
    }
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${files.length} config(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${files.length} config(s) passed validation.`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
