/**
 * Validate that the agent mod's remote interface matches the TypeScript client 1:1
 * Run: npm run validate-interface
 */

import { readFile } from "fs/promises";
import { compareInterface } from "../src/agent/interface-check";
import { getAgentConfig } from "../src/config";

const CONTROL_LUA = "mods/agent/control.lua";

async function main() {
  console.log("🔍 Validating agent remote interface vs TypeScript client...\n");

  const { interfaceName } = getAgentConfig();
  const source = await readFile(CONTROL_LUA, "utf-8");
  const report = compareInterface(source, interfaceName);

  console.log(`📋 ${CONTROL_LUA} registers "${interfaceName}":`);
  for (const fn of report.luaFunctions) {
    const icon = report.missingInTs.includes(fn) ? "❌" : "✅";
    console.log(`  ${icon} ${fn}`);
  }

  for (const fn of report.missingInLua) {
    console.log(`  ❌ ${fn} (MISSING IN LUA)`);
  }
  for (const fn of report.missingInTs) {
    console.log(`  ❌ ${fn} (NO TYPESCRIPT CLIENT METHOD)`);
  }

  const errors = report.missingInLua.length + report.missingInTs.length;
  console.log();
  if (errors > 0) {
    console.log(`❌ ${errors} mismatch(es) found`);
    process.exit(1);
  }
  console.log("✅ Interface and client are in sync");
}

main().catch((error) => {
  console.error("❌ Validation failed:", error);
  process.exit(1);
});
