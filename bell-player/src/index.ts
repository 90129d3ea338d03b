#!/usr/bin/env node

/**
 * Bell Player CLI
 *
 * Rings audio bells at the configured times of day, each one a clip cut
 * from the next link in the link sheet. Ctrl+C rings the upcoming bell early
 * (or stops a playing one); press it twice quickly to quit.
 */

import { Command } from 'commander';
import { DEFAULT_CONFIG_FILE, loadConfig } from './config.js';
import { readLinkSheet } from './links.js';
import { MediaPlayer } from './media.js';
import { StateStore } from './state.js';
import { BellScheduler } from './scheduler.js';
import { showSchedule, parseCount, showLinks, playOnce, fetchAll } from './commands.js';
import { logger } from './lib/logger.js';
import type { BellConfig } from './schemas/index.js';

interface GlobalOptions {
  config: string;
  debug?: boolean;
}

const program = new Command();

program
  .name('bell-player')
  .description('Play scheduled audio bells from a rotating list of links')
  .version('1.0.0')
  .option('-c, --config <file>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .option('--debug', 'Show debug output');

function setup(withLogFile = true): BellConfig {
  const options = program.opts<GlobalOptions>();
  if (options.debug) {
    logger.enableDebug();
  }
  const config = loadConfig(options.config);
  if (withLogFile) {
    logger.attachLogFile(config.logFile);
  }
  return config;
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
}

program
  .command('run', { isDefault: true })
  .description('Wait for each scheduled bell and play it')
  .action(async () => {
    try {
      const config = setup();
      const scheduler = new BellScheduler(config, {
        player: new MediaPlayer(config),
        state: new StateStore(config.stateFile),
        readLinks: () => readLinkSheet(config.linksFile),
      });

      process.on('SIGINT', () => {
        const action = scheduler.interrupt();
        if (action === 'ignored') process.exit(130);
      });
      process.on('SIGTERM', () => {
        scheduler.stop().catch(fail);
      });

      logger.info('Bell player started', { config: program.opts<GlobalOptions>().config, bells: config.schedule });
      console.error('Press Ctrl+C to ring the next bell now (or stop a playing one); press it twice to quit.');
      await scheduler.start();
      process.exit(0);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('schedule')
  .description('Show the upcoming bells')
  .option('-n, --count <n>', 'Number of bells to list', '7')
  .action((options: { count: string }) => {
    try {
      const config = setup(false);
      showSchedule(config, parseCount(options.count), line => console.log(line));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('links')
  .description('List the links in rotation')
  .action(() => {
    try {
      const config = setup(false);
      showLinks(config, new StateStore(config.stateFile), line => console.log(line));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('play [index]')
  .description('Play one bell now (the next link in rotation unless an index is given)')
  .action(async (indexArg: string | undefined) => {
    try {
      const config = setup();
      const player = new MediaPlayer(config);
      process.on('SIGINT', () => player.cancel());

      await playOnce(config, indexArg, {
        player,
        state: new StateStore(config.stateFile),
        onPlayback: playback => {
          process.on('SIGINT', () => playback.stop());
        },
      });
    } catch (err) {
      fail(err);
    }
  });

program
  .command('fetch')
  .description('Fetch the clip for every link into the media directory')
  .action(async () => {
    try {
      const config = setup();
      const player = new MediaPlayer(config);
      process.on('SIGINT', () => player.cancel());

      const code = await fetchAll(config, player, line => console.log(line));
      if (code !== 0) {
        process.exit(code);
      }
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
