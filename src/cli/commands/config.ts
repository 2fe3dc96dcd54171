import pc from "picocolors";
import { loadConfig } from "../../config";

export function validateConfig(configPath?: string): boolean {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log(`${pc.green("✓")} Config check passed: ${result.path}`);
    return true;
  }
  console.error(`${pc.red("✗")} Config check failed: ${result.path}`);
  for (const error of result.errors ?? []) {
    console.error(`  - ${pc.yellow(error)}`);
  }
  process.exitCode = 1;
  return false;
}
