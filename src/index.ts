#!/usr/bin/env node

import { initI18n } from "./i18n/index.js";
import { runCli } from "./cli.js";

async function main() {
  await initI18n("en");
  const exitCode = await runCli(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((err) => {
  console.error("Scriptor failed to start:", err);
  process.exit(1);
});
