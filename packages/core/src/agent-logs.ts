/**
 * In-memory agent log buffer.
 * Stores recent logs with timestamps and agent names. Entries below the
 * configured threshold are dropped; warnings and errors (everything, at the
 * debug threshold) are echoed to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';
export type AgentLogThreshold = Exclude<LogLevel, 'success'>;

export interface AgentLogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, success: 1, warn: 2, error: 3 };

const MAX_LOGS = 500;
const logs: AgentLogEntry[] = [];
let nextId = 1;
let threshold: AgentLogThreshold = 'info';

export function setAgentLogLevel(level: AgentLogThreshold): void {
  threshold = level;
}

export function getAgentLogLevel(): AgentLogThreshold {
  return threshold;
}

export function agentLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
): AgentLogEntry | null {
  const level = options?.level ?? 'info';
  if (RANK[level] < RANK[threshold]) return null;

  const entry: AgentLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level,
    message,
    detail: options?.detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  if (threshold === 'debug' || RANK[level] >= RANK.warn) {
    const line = `[${agent}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error') console.error(line, entry.detail ?? '');
    else console.log(line, entry.detail ?? '');
  }
  return entry;
}

export function getAgentLogs(afterId?: string): AgentLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearAgentLogs(): void {
  logs.length = 0;
}
