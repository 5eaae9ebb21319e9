#!/usr/bin/env node

/**
 * Command-line entry point
 * Analyzes the repository named by GITHUB_REPO_OWNER/GITHUB_REPO_NAME and
 * writes the report to OUTPUT_DIR.
 */

import { runAnalysis } from './analyzer.js';
import { loadConfig } from './config.js';
import { createTextGenerator, createToolSessionFactory } from './factories.js';
import { ConsoleProgressReporter } from './services/progress-reporter.js';
import { createLogger, getErrorMessage, loadEnv, setLogLevel } from './shared/index.js';

const log = createLogger('CLI');

async function main(): Promise<void> {
  loadEnv();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  await runAnalysis(config, {
    sessionFactory: createToolSessionFactory(config),
    generator: createTextGenerator(config.llm),
    progress: new ConsoleProgressReporter(),
  });
}

main().catch((error) => {
  log.error(`Analysis failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
