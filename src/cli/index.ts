#!/usr/bin/env node

/**
 * git-remote-dokuwiki: git invokes this as `git-remote-dokuwiki <remote> [<url>]`
 * for any `dokuwiki::` URL.
 */

import { Command } from 'commander';
import { loadConfig } from './configLoader.js';
import { setupInterruptHandler } from './interrupt.js';
import { runHelper } from '../core/helperRunner.js';
import { logger } from '../util/logger.js';

async function handleHelperAction(remote: string, url: string | undefined): Promise<void> {
  const cleanup = setupInterruptHandler();
  try {
    const config = await loadConfig({ remote, url });
    logger.setLevel(config.logLevel);
    logger.setFormat(config.logFormat);

    process.exitCode = await runHelper(config, { input: process.stdin, output: process.stdout });
  } finally {
    cleanup();
    // git may keep the pipe open after the final blank line.
    process.stdin.destroy();
  }
}

const program = new Command();

program
  .name('git-remote-dokuwiki')
  .description('git remote helper that syncs a repository with a DokuWiki namespace')
  .version('0.1.0')
  .argument('<remote>', 'remote name (or URL when there is no configured remote)')
  .argument('[url]', 'wiki URL: [https://][user@]host[/namespace]')
  .action(handleHelperAction);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
