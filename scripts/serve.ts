import dotenv from 'dotenv';
import chokidar from 'chokidar';

import { createSiteApp } from '../src/app';
import { readDirectoryConfigFromEnv } from '../src/services/directoryConfig';
import { createOrchestratorOptions, runOnce } from '../src/services/orchestrator';
import { RunTrigger } from '../src/services/runTrigger';

dotenv.config();

const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = readDirectoryConfigFromEnv();
  const orchestratorOptions = createOrchestratorOptions(config);

  const runTrigger = new RunTrigger(async () => {
    try {
      await runOnce(orchestratorOptions);
    } catch (error: unknown) {
      console.error('Game build run failed', error);
    }
  });

  console.log('Running initial build...');
  await runTrigger.trigger();

  const rebuildTimer = setInterval(() => {
    void runTrigger.trigger();
  }, config.rebuildIntervalHours * MILLISECONDS_PER_HOUR);
  console.log(`Rebuilding every ${config.rebuildIntervalHours} hour(s)`);

  const manifestWatcher = chokidar.watch(config.manifestPath, {
    ignoreInitial: true,
    persistent: true
  });

  manifestWatcher.on('all', (eventName) => {
    if (!['add', 'change'].includes(eventName)) {
      return;
    }

    console.log(`Manifest ${eventName}, rebuilding`);
    void runTrigger.trigger();
  });

  const app = createSiteApp({ publicRootPath: config.publicRootPath });
  const server = app.listen(config.port, () => {
    console.log(`Game Directory listening on http://localhost:${config.port}`);
  });

  async function shutdown(exitCode: number): Promise<void> {
    clearInterval(rebuildTimer);
    await manifestWatcher.close();
    server.close();
    process.exit(exitCode);
  }

  process.on('SIGINT', () => {
    void shutdown(0);
  });

  process.on('SIGTERM', () => {
    void shutdown(0);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start Game Directory', error);
  process.exit(1);
});
