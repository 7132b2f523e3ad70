import './loadEnv.js';
import { loadConfig } from './config.js';
import { createPipeline } from './pipelineFactory.js';
import { createApp } from './server.js';
import { errorMessage } from './errors.js';
import { consoleLogger } from './utils/logger.js';

// Environment variables are loaded via ./loadEnv.js import at the top

async function main(): Promise<void> {
  const config = loadConfig();
  const { orchestrator, ledger } = await createPipeline(config, consoleLogger);

  const app = createApp({
    ledger,
    runPipeline: () => orchestrator.run(),
    corsOrigins: config.corsOrigins,
    logger: consoleLogger,
  });

  app.listen(config.port, () => {
    consoleLogger.info(`Server is running on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  consoleLogger.error('Server failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
