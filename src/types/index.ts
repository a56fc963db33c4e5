export interface Config {
  botToken: string;
  recipientChatId: number | string;
  checkIntervalMinutes: number;
  statusPort?: number;
}

export interface WatchState {
  lastKnownIp: string | null;
  lastCheckAt: string | null;
  updatedAt: string;
}

export interface ChangeHistory {
  updates: ChangeEntry[];
}

export interface ChangeEntry {
  id: string;
  timestamp: string;
  oldIp: string | null;
  newIp: string;
  notified: boolean;
}

export type MonitorStatus = 'active' | 'checking' | 'error';

export interface CheckResult {
  success: boolean;
  ipChanged: boolean;
  notified: boolean;
  currentIp: string | null;
  message: string;
}

export interface StatusResponse {
  currentIp: string;
  lastCheckAt: string | null;
  status: MonitorStatus;
  nextCheck: string | null;
  checkIntervalMinutes: number;
  lastResult: CheckResult | null;
}
