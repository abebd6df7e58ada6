#!/usr/bin/env tsx

/**
 * Runner for the notifier pipeline
 * Loads environment variables, wires the live clients and processes every
 * collection listed in the state file.
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

// Find project root (go up two levels from scripts/notify directory)
const projectRoot = path.resolve(__dirname, '../..');

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { Command } from 'commander';
import { CsvDirectorySource, SlackDirectorySource, StaticDirectorySource, type DirectorySource } from '../../src/adapters/directory';
import { SlackChatClient } from '../../src/adapters/slack';
import { SmtpMailTransport, type MailTransport } from '../../src/adapters/smtp';
import { ZoteroSource } from '../../src/adapters/zotero';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../../src/config/environment';
import { DryRunDispatcher, LiveDispatcher, type Dispatcher } from '../../src/notifier/deliveryDispatcher';
import { createMentionResolver } from '../../src/notifier/mentionResolver';
import { runNotifier } from '../../src/notifier/runNotifier';
import { WatermarkStore } from '../../src/notifier/watermarkStore';
import { ConfigurationError } from '../../src/utils/errors';
import { createRunLogger } from '../../src/utils/logger';

interface CliOptions {
  stateFile?: string;
  dryRun?: boolean;
}

function createDirectorySource(config: EnvironmentConfig, slack?: SlackChatClient): DirectorySource {
  const { directorySource, directoryCsvUrl } = config.mentions;
  if (directorySource === 'slack' && slack) {
    return new SlackDirectorySource(slack);
  }
  if (directorySource === 'csv' && directoryCsvUrl) {
    return new CsvDirectorySource(directoryCsvUrl);
  }
  // Dry runs may go without a directory; mentions then stay unresolved
  return new StaticDirectorySource([]);
}

function createMailTransport(config: EnvironmentConfig): MailTransport | undefined {
  const { email } = config;
  if (email.recipients.length === 0 || !email.user || !email.password) {
    return undefined;
  }
  return new SmtpMailTransport({
    host: email.host,
    port: email.port,
    user: email.user,
    password: email.password,
    from: email.from ?? email.user
  });
}

async function main() {
  const program = new Command()
    .name('run-notifier')
    .description('Post new and updated publications to Slack and email')
    .option('-s, --state-file <path>', 'CSV state file with collection watermarks')
    .option('-n, --dry-run', 'Render and log messages without sending or updating state')
    .parse(process.argv);
  const options = program.opts<CliOptions>();

  let config: EnvironmentConfig;
  try {
    config = loadEnvironmentConfig(process.env, {
      dryRun: options.dryRun ? true : undefined,
      stateFilePath: options.stateFile
    });
  } catch (error) {
    console.error(error instanceof ConfigurationError ? error.message : error);
    process.exit(1);
  }

  const logger = createRunLogger({ level: config.logging.level, filePath: config.logging.filePath });
  let mail: MailTransport | undefined;
  let exitCode = 0;

  try {
    logger.info(`Starting notifier${config.dryRun ? ' (dry run)' : ''} with state file ${config.state.filePath}`);

    const slack = config.slack.token ? new SlackChatClient(config.slack.token) : undefined;
    const entries = await createDirectorySource(config, slack).load();
    logger.info(`Loaded ${entries.length} directory entries for mention resolution`);
    const resolver = createMentionResolver(config.mentions.resolver, entries);

    let dispatcher: Dispatcher;
    if (config.dryRun) {
      dispatcher = new DryRunDispatcher(logger.child('dry-run'), config.email.recipients);
    } else {
      mail = createMailTransport(config);
      dispatcher = new LiveDispatcher({
        chat: slack,
        mail,
        emailRecipients: config.email.recipients,
        emailFailurePolicy: config.email.failurePolicy,
        retryMaxAttempts: config.delivery.retryMaxAttempts,
        retryBaseDelayMs: config.delivery.retryBaseDelayMs,
        postDelayMs: config.delivery.postDelayMs,
        logger: logger.child('delivery')
      });
    }

    const result = await runNotifier({
      store: new WatermarkStore(config.state.filePath),
      source: new ZoteroSource({
        apiKey: config.zotero.apiKey,
        libraryId: config.zotero.libraryId,
        libraryType: config.zotero.libraryType,
        pageSize: config.zotero.pageSize
      }),
      dispatcher,
      resolver,
      logger,
      dryRun: config.dryRun,
      unmatchedMentions: config.mentions.unmatched,
      noteFetchDelayMs: config.delivery.noteFetchDelayMs
    });

    console.log(`Total publications posted: ${result.stats.posted}, Failures: ${result.stats.failures}`);
    if (result.stats.emailsSent + result.stats.emailFailures > 0) {
      console.log(`Emails sent: ${result.stats.emailsSent}, Email failures: ${result.stats.emailFailures}`);
    }
    console.log(result.stateUpdated ? 'State file updated successfully.' : 'Dry run: state file not updated.');
    logger.info(`Notifier finished in ${result.duration}ms`);
  } catch (error) {
    logger.error('Notifier run failed', error);
    exitCode = 1;
  } finally {
    mail?.close();
    await logger.close();
  }

  process.exit(exitCode);
}

main().catch(error => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
