import { randomUUID } from 'crypto';
import type { ChangeEntry, CheckResult, Config, MonitorStatus } from '../types/index.js';
import { errorMessage } from '../types/errors.js';
import { Logger } from './logger.js';
import type { StorageService } from './storage.js';

export interface IpSource {
  getCurrentIp(): Promise<string>;
}

export interface Notifier {
  sendMessage(chatId: number | string, text: string): Promise<void>;
}

export interface IpMonitorDeps {
  config: Config;
  storage: StorageService;
  detector: IpSource;
  notifier: Notifier;
}

export function formatIpChangeMessage(ip: string): string {
  return `New public IP address detected: \`${ip}\`.`;
}

export class IpMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private status: MonitorStatus = 'active';
  private nextCheckAt: Date | null = null;
  private lastResult: CheckResult | null = null;

  constructor(private readonly deps: IpMonitorDeps) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    Logger.info('Starting IP monitoring service', {
      checkIntervalMinutes: this.deps.config.checkIntervalMinutes,
      recipientChatId: this.deps.config.recipientChatId
    });

    // Do an initial check immediately
    this.runScheduledCheck();
  }

  stop(): void {
    this.running = false;
    this.nextCheckAt = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    Logger.info('IP monitoring stopped');
  }

  getStatus(): MonitorStatus {
    return this.status;
  }

  getNextCheckTime(): Date | null {
    return this.nextCheckAt;
  }

  getLastResult(): CheckResult | null {
    return this.lastResult;
  }

  private get intervalMs(): number {
    return this.deps.config.checkIntervalMinutes * 60 * 1000;
  }

  private runScheduledCheck(): void {
    this.timer = null;
    this.nextCheckAt = null;

    void this.performIpCheck()
      .catch((error: unknown) => {
        Logger.error('IP check failed, rescheduling', error instanceof Error ? error : undefined, {
          error: errorMessage(error)
        });
      })
      .finally(() => this.scheduleNextCheck());
  }

  private scheduleNextCheck(): void {
    if (!this.running) return;

    this.nextCheckAt = new Date(Date.now() + this.intervalMs);
    this.timer = setTimeout(() => this.runScheduledCheck(), this.intervalMs);

    Logger.debug(`Next IP check scheduled in ${this.deps.config.checkIntervalMinutes} minutes`, {
      nextCheck: this.nextCheckAt.toISOString()
    });
  }

  /**
   * Look up the public IP and notify the recipient when it differs from the
   * persisted one. The persisted IP only advances after a successful send.
   */
  async performIpCheck(): Promise<CheckResult> {
    const { config, storage, detector, notifier } = this.deps;
    this.status = 'checking';

    try {
      Logger.info('Starting IP check');

      const currentIp = await detector.getCurrentIp();
      const checkedAt = new Date().toISOString();
      const { lastKnownIp } = storage.readState();

      Logger.debug('IP comparison', { currentIp, lastKnownIp });

      if (lastKnownIp === currentIp) {
        storage.recordCheck(checkedAt);
        Logger.info('No IP change detected', { currentIp });
        this.status = 'active';
        return this.finish({
          success: true,
          ipChanged: false,
          notified: false,
          currentIp,
          message: 'No change detected'
        });
      }

      const text = formatIpChangeMessage(currentIp);
      Logger.info(text, { previousIp: lastKnownIp });

      let notified = false;
      try {
        await notifier.sendMessage(config.recipientChatId, text);
        notified = true;
      } catch (error) {
        Logger.error('An unexpected exception occurred while trying to send a message.', undefined, {
          error: errorMessage(error),
          currentIp
        });
      }

      if (notified) {
        storage.updateLastKnownIp(currentIp, checkedAt);
      } else {
        storage.recordCheck(checkedAt);
      }

      // A send that keeps failing for the same address is recorded once
      const [latest] = storage.readHistory().updates;
      const repeatedFailure = !notified && latest?.newIp === currentIp && latest.notified === false;
      if (!repeatedFailure) {
        const entry: ChangeEntry = {
          id: randomUUID(),
          timestamp: checkedAt,
          oldIp: lastKnownIp,
          newIp: currentIp,
          notified
        };
        storage.addChangeEntry(entry);
      }

      this.status = notified ? 'active' : 'error';
      return this.finish({
        success: notified,
        ipChanged: true,
        notified,
        currentIp,
        message: notified ? 'IP address change notified' : 'IP address changed but notification failed'
      });
    } catch (error) {
      this.status = 'error';
      this.lastResult = {
        success: false,
        ipChanged: false,
        notified: false,
        currentIp: null,
        message: `Check failed: ${errorMessage(error)}`
      };
      throw error;
    }
  }

  private finish(result: CheckResult): CheckResult {
    this.lastResult = result;
    return result;
  }
}
