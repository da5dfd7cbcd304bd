#!/usr/bin/env node

import chalk from 'chalk';
import dotenv from 'dotenv';
import ora from 'ora';
import type { Ora } from 'ora';
import { collectCliInput, createProgram } from './cli.js';
import { describeConfig, loadSettings } from './config/settings.js';
import { FetchHttpClient } from './http/client.js';
import { SplunkbaseClient } from './splunkbase/client.js';
import { Reconciler } from './reconciler/index.js';
import { printSummary } from './reporter/index.js';
import { createConsoleLogger, spinnerSafeWriter } from './logger.js';
import { errorMessage } from './errors.js';

const program = createProgram();

program.action(async () => {
  // Variables already present in the environment take precedence over .env
  dotenv.config();

  const input = collectCliInput(program);
  const { settings, config } = await loadSettings({
    cliValues: input.values,
    configPath: input.configPath,
    logger: createConsoleLogger(),
  });
  let spinner: Ora | undefined;
  const logger = createConsoleLogger({
    level: settings.logLevel,
    write: spinnerSafeWriter(line => console.log(line), () => spinner),
  });

  logger.info('Starting Splunkbase app download');
  logger.debug(`Effective configuration: ${describeConfig(config)}`);

  const client = new SplunkbaseClient({
    http: new FetchHttpClient({ timeoutMs: settings.timeoutMs }),
    credentials: { username: settings.username, password: settings.password },
    outputDir: settings.outputDir,
    logger,
  });

  spinner = ora('Authenticating with Splunkbase...').start();
  try {
    await client.authenticate();
    spinner.succeed('Authentication successful');
  } catch (err) {
    spinner.fail(chalk.red('Authentication failed'));
    throw err;
  }

  const reconciler = new Reconciler({ client, ledgerPath: settings.appsFile, logger });
  const result = await reconciler.reconcile();

  printSummary(result);
  logger.info('Download completed successfully');
});

const interrupt = (): void => {
  console.log(chalk.yellow('\nProcess interrupted by user'));
  process.exit(1);
};
process.once('SIGINT', interrupt);
process.once('SIGTERM', interrupt);

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`\nAn error occurred during execution: ${errorMessage(err)}`));
  process.exit(1);
});
