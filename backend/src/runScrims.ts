import './loadEnv.js';
import { loadConfig } from './config.js';
import { createPipeline } from './pipelineFactory.js';
import { errorMessage, isPipelineError } from './errors.js';
import { consoleLogger } from './utils/logger.js';

// One pipeline run, then exit. Non-zero exit when the run aborts.
async function main(): Promise<void> {
  const config = loadConfig();
  const { orchestrator } = await createPipeline(config, consoleLogger, { createSpreadsheetIfMissing: true });
  const summary = await orchestrator.run();
  console.log(JSON.stringify(summary, null, 2));
}

main().catch((err: unknown) => {
  consoleLogger.error('Scrim run failed', {
    error: errorMessage(err),
    kind: isPipelineError(err) ? err.name : undefined,
    seriesId: isPipelineError(err) ? err.seriesId : undefined,
  });
  process.exitCode = 1;
});
