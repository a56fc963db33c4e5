import https from 'https';
import http from 'http';
import net from 'net';
import { IpDetectionError, errorMessage } from '../types/errors.js';
import { Logger } from './logger.js';

export interface IpService {
  name: string;
  url: string;
}

export interface IpDetectorOptions {
  services?: IpService[];
  timeoutMs?: number;
  retryDelays?: number[];
}

export const DEFAULT_IP_SERVICES: IpService[] = [
  { name: 'ipify', url: 'https://api.ipify.org' },
  { name: 'icanhazip', url: 'https://icanhazip.com' },
  { name: 'ifconfig.me', url: 'https://ifconfig.me/ip' }
];

export class IpDetector {
  private readonly services: IpService[];
  private readonly timeoutMs: number;
  // One entry per retry after the first attempt
  private readonly retryDelays: number[];

  constructor(options: IpDetectorOptions = {}) {
    this.services = options.services ?? DEFAULT_IP_SERVICES;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.retryDelays = options.retryDelays ?? [2000, 5000];
  }

  async getCurrentIp(): Promise<string> {
    Logger.debug('Starting IP detection');

    let lastError: Error | null = null;

    // Try each service in order
    for (const [index, service] of this.services.entries()) {
      try {
        Logger.debug(`Trying IP detection via ${service.name}`);
        const ip = await this.retryOperation(() => this.fetchFrom(service));

        Logger.logIpCheck({
          success: true,
          currentIp: ip,
          context: { service: service.name, attempt: index + 1 }
        });
        return ip;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        Logger.warn(`IP service ${service.name} failed`, {
          error: lastError.message,
          service: service.name,
          attempt: index + 1
        });
      }
    }

    const servicesAttempted = this.services.map(s => s.name);
    Logger.logIpCheck({
      success: false,
      error: 'All IP detection services failed',
      context: {
        servicesAttempted,
        lastError: lastError?.message ?? 'Unknown error'
      }
    });
    throw new IpDetectionError(
      `Failed to detect IP address from all services${lastError ? `: ${lastError.message}` : ''}`,
      servicesAttempted
    );
  }

  // Every service answers with the bare address as plain text
  async fetchFrom(service: IpService): Promise<string> {
    const ip = (await this.httpRequest(service.url)).trim();

    if (net.isIP(ip) === 0) {
      throw new Error(`Invalid response format: \`${ip.slice(0, 64)}\` is not an IP address`);
    }
    return ip;
  }

  private async retryOperation(operation: () => Promise<string>): Promise<string> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retryDelays.length; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (attempt < this.retryDelays.length) {
          const delay = this.retryDelays[attempt];
          Logger.debug(`Retry attempt ${attempt + 1} in ${delay}ms`, { error: errorMessage(error) });
          await sleep(delay);
        }
      }
    }

    throw lastError;
  }

  private httpRequest(url: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const onResponse = (response: http.IncomingMessage): void => {
        let data = '';

        response.setEncoding('utf8');
        response.on('data', (chunk: string) => {
          data += chunk;
        });

        // Fires when the connection drops before the body ends
        response.on('error', reject);

        response.on('end', () => {
          if (response.statusCode !== 200) {
            reject(new Error(`HTTP ${response.statusCode}: ${response.statusMessage}`));
            return;
          }
          resolve(data);
        });
      };

      const request = url.startsWith('https')
        ? https.get(url, { timeout: this.timeoutMs }, onResponse)
        : http.get(url, { timeout: this.timeoutMs }, onResponse);

      request.on('timeout', () => {
        request.destroy();
        reject(new Error(`Request timeout after ${this.timeoutMs}ms`));
      });

      request.on('error', (error) => {
        reject(error);
      });
    });
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
