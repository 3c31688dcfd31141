import dotenv from 'dotenv';

import { readDirectoryConfigFromEnv } from '../src/services/directoryConfig';
import { createOrchestratorOptions, hasFailures, runOnce } from '../src/services/orchestrator';

dotenv.config();

async function main(): Promise<void> {
  const config = readDirectoryConfigFromEnv();
  const summary = await runOnce(createOrchestratorOptions(config));

  if (config.failOnGameError && hasFailures(summary)) {
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  console.error('Failed to build games', error);
  process.exit(1);
});
