#!/usr/bin/env node
import path from 'path';
import type { Server } from 'http';
import { config as loadEnv } from 'dotenv';
import { createApp, startStatusServer } from './app.js';
import type { Config } from './types/index.js';
import { ConfigError, errorMessage } from './types/errors.js';
import { ConfigService, type LoadConfigResult } from './services/config.js';
import { IpDetector } from './services/ipDetector.js';
import { IpMonitor } from './services/ipMonitor.js';
import { Logger } from './services/logger.js';
import { StorageService } from './services/storage.js';
import { TelegramService } from './services/telegram.js';

// Load environment variables from .env file
loadEnv();

const CONFIG_PATH = path.resolve(process.env.IPWATCH_CONFIG_PATH || 'configuration.json');
const DATA_DIR = path.resolve(process.env.IPWATCH_DATA_DIR || 'data');
const LOG_DIR = path.resolve(process.env.IPWATCH_LOG_DIR || 'logs');

function loadConfig(): Config {
  let loaded: LoadConfigResult;
  try {
    loaded = ConfigService.loadOrCreate(CONFIG_PATH);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    Logger.error('Failed to read JSON configuration.', undefined, { path: CONFIG_PATH, issues: error.issues });
    console.error(`${error.message} in ${CONFIG_PATH}`);
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
    console.error('Either repair the existing configuration file, or delete it and re-run this script.');
    process.exit(1);
  }

  if (loaded.created) {
    console.log(`Created ${loaded.path}`);
    console.log('Please edit the configuration file and re-run this script.');
    process.exit(0);
  }
  return loaded.config;
}

function main(): void {
  // Initialize logger first
  Logger.init({ logDir: LOG_DIR });

  const config = loadConfig();
  const storage = new StorageService(DATA_DIR);
  storage.initialize();

  const monitor = new IpMonitor({
    config,
    storage,
    detector: new IpDetector(),
    notifier: new TelegramService(config.botToken)
  });

  let server: Server | null = null;
  if (config.statusPort !== undefined) {
    server = startStatusServer(createApp({ config, monitor, storage }), config.statusPort);
  }

  const shutdown = (signal: string): void => {
    Logger.info(`Received ${signal}, shutting down gracefully`);
    monitor.stop();
    if (server?.listening) {
      server.close();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  Logger.info('ipwatch started', {
    configPath: CONFIG_PATH,
    dataDir: DATA_DIR,
    checkIntervalMinutes: config.checkIntervalMinutes,
    nodeEnv: process.env.NODE_ENV || 'development'
  });
  monitor.start();
}

try {
  main();
} catch (error) {
  Logger.error('Fatal error during startup', error instanceof Error ? error : undefined, { error: errorMessage(error) });
  process.exit(1);
}
