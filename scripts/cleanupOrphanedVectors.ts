import "dotenv/config";
import { createApplication } from "../src/bootstrap.js";
import { loadConfig } from "../src/config/env.js";
import { ConsoleLogger } from "../src/utils/logger.js";

interface CliOptions {
  dryRun: boolean;
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { dryRun: false };
  for (const arg of argv) {
    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}. Usage: cleanupOrphanedVectors [--dry-run]`);
  }
  return options;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel, "cleanup");
  const app = await createApplication(config, logger);

  try {
    const result = await app.service.reconcileOrphanedVectors({ dryRun: options.dryRun });
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  console.error("Orphan cleanup failed:", error);
  process.exit(1);
});
