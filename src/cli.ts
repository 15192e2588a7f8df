#!/usr/bin/env node

/**
 * anime1 relay CLI
 *
 * Usage:
 *   anime1-relay serve                          - Start the relay server
 *   anime1-relay parse <url>                    - Describe a post or category page as JSON
 *   anime1-relay playlist <categoryId> -f xspf  - Print or save a category playlist
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { readFileSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { Relay } from './core/relay.js';
import { loadConfig, type RelayConfig } from './core/config.js';
import { PLAYLIST_TYPES } from './types.js';
import { isDebugEnabled } from './core/debug.js';

const program = new Command();

// Read version from package.json dynamically
function readVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(resolve(here, '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    if (isDebugEnabled()) console.debug('[relay]', 'package.json not readable:', error);
  }
  return '0.0.0';
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

interface CommonOptions {
  timeout?: number;
  debug?: boolean;
}

function configFrom(options: CommonOptions & { host?: string; port?: number; cacheSize?: number }): RelayConfig {
  if (options.debug) process.env.DEBUG = '1';
  return loadConfig(process.env, {
    host: options.host,
    port: options.port,
    requestTimeoutMs: options.timeout,
    cacheSize: options.cacheSize,
    debug: options.debug,
  });
}

function loadOrFail(options: Parameters<typeof configFrom>[0]): RelayConfig {
  try {
    return configFrom(options);
  } catch (error) {
    return fail(error);
  }
}

function defaultBase(config: RelayConfig): string {
  return `http://${config.host}:${config.port}`;
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}

program
  .name('anime1-relay')
  .description('Local relay that turns anime1.me pages into playable streams and playlists')
  .version(readVersion());

program
  .command('serve')
  .description('Start the relay server')
  .option('-H, --host <host>', 'Listen address')
  .option('-p, --port <port>', 'Port number', parseInteger)
  .option('--timeout <ms>', 'Upstream timeout in ms', parseInteger)
  .option('--cache-size <n>', 'Maximum cached video resolutions', parseInteger)
  .option('--debug', 'Verbose logging')
  .action(async (options: CommonOptions & { host?: string; port?: number; cacheSize?: number }) => {
    const config = loadOrFail(options);
    const { startServer } = await import('./server/app.js');
    startServer(config);
  });

program
  .command('parse <url>')
  .description('Describe an anime1.me post or category page in terms of relay endpoints')
  .option('-b, --base <uri>', 'Base URI of the relay the links should point at')
  .option('--timeout <ms>', 'Upstream timeout in ms', parseInteger)
  .option('--debug', 'Verbose logging')
  .action(async (url: string, options: CommonOptions & { base?: string }) => {
    const config = loadOrFail(options);
    const spinner = ora({ text: `Parsing ${url}`, stream: process.stderr }).start();
    const relay = new Relay({ timeoutMs: config.requestTimeoutMs });
    try {
      const result = await relay.resolve(options.base ?? defaultBase(config), url);
      spinner.stop();
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    } catch (error) {
      spinner.fail('Parse failed');
      await relay.shutdown();
      fail(error);
    }
    await relay.shutdown();
  });

program
  .command('playlist <categoryId>')
  .description('Render a category playlist')
  .option('-f, --format <type>', `Playlist format (${PLAYLIST_TYPES.join(', ')})`, 'm3u8')
  .option('-b, --base <uri>', 'Base URI of the relay the entries should point at')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--timeout <ms>', 'Upstream timeout in ms', parseInteger)
  .option('--debug', 'Verbose logging')
  .action(async (categoryId: string, options: CommonOptions & { format: string; base?: string; output?: string }) => {
    const config = loadOrFail(options);
    const spinner = ora({ text: `Fetching category ${categoryId}`, stream: process.stderr }).start();
    const relay = new Relay({ timeoutMs: config.requestTimeoutMs });
    try {
      const info = await relay.getPlaylist(options.base ?? defaultBase(config), categoryId, options.format);
      if (options.output) {
        writeFileSync(options.output, info.content, 'utf-8');
        spinner.succeed(`Saved ${info.type} playlist to ${options.output}`);
      } else {
        spinner.stop();
        process.stdout.write(info.content);
      }
    } catch (error) {
      spinner.fail('Playlist failed');
      await relay.shutdown();
      fail(error);
    }
    await relay.shutdown();
  });

program.parseAsync().catch(fail);
