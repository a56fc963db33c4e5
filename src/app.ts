import express from 'express';
import type { Server } from 'http';
import type { Config, StatusResponse } from './types/index.js';
import { errorMessage } from './types/errors.js';
import type { IpMonitor } from './services/ipMonitor.js';
import type { StorageService } from './services/storage.js';
import { Logger } from './services/logger.js';
import { SecurityService } from './services/security.js';

export interface AppDeps {
  config: Config;
  monitor: IpMonitor;
  storage: StorageService;
}

/**
 * Read-only status endpoints. Nothing here changes the configuration or the
 * watch state.
 */
export function createApp({ config, monitor, storage }: AppDeps): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const message = `${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`;
      if (res.statusCode >= 400) {
        Logger.warn(message, { method: req.method, path: req.path, status: res.statusCode, duration });
      } else {
        Logger.debug(message);
      }
    });

    next();
  });

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'healthy',
      uptime: process.uptime()
    });
  });

  app.get('/api/status', (req, res) => {
    try {
      const state = storage.readState();
      const nextCheck = monitor.getNextCheckTime();
      const lastResult = monitor.getLastResult();

      const body: StatusResponse = {
        currentIp: SecurityService.obfuscateIp(state.lastKnownIp),
        lastCheckAt: state.lastCheckAt,
        status: monitor.getStatus(),
        nextCheck: nextCheck ? nextCheck.toISOString() : null,
        checkIntervalMinutes: config.checkIntervalMinutes,
        lastResult: lastResult && {
          ...lastResult,
          currentIp: lastResult.currentIp && SecurityService.obfuscateIp(lastResult.currentIp),
          message: SecurityService.sanitizeErrorMessage(lastResult.message)
        }
      };
      res.json(body);
    } catch (error) {
      res.status(500).json({
        success: false,
        error: 'Failed to get status',
        details: SecurityService.sanitizeErrorMessage(errorMessage(error))
      });
    }
  });

  app.get('/api/history', (req, res) => {
    try {
      const history = storage.readHistory();
      res.json({
        updates: history.updates.map(update => ({
          ...update,
          oldIp: SecurityService.obfuscateIp(update.oldIp),
          newIp: SecurityService.obfuscateIp(update.newIp)
        }))
      });
    } catch (error) {
      res.status(500).json({
        success: false,
        error: 'Failed to get history',
        details: SecurityService.sanitizeErrorMessage(errorMessage(error))
      });
    }
  });

  return app;
}

/**
 * Listen on `port`. A bind failure is logged and the process keeps watching
 * without the endpoint.
 */
export function startStatusServer(app: express.Express, port: number): Server {
  const server = app.listen(port);

  server.on('listening', () => {
    Logger.info(`Status endpoint listening on port ${port}`);
  });

  server.on('error', (error: Error) => {
    Logger.error('Status endpoint could not start, continuing without it', error, { port });
  });

  return server;
}
