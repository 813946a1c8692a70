/**
 * Agent logger. One root logger per workflow (or scheduled pass); agents get
 * children of it. Entries go to an optional sink and, when LOG_LEVEL=debug or
 * the entry is an error, to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface AgentLogRecord {
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
  workflowId?: string;
}

export type LogSink = (record: AgentLogRecord) => void;

export interface AgentLogger {
  readonly agent: string;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  success(message: string, data?: unknown): void;
  child(agent: string): AgentLogger;
}

export interface AgentLoggerOptions {
  sink?: LogSink;
  workflowId?: string;
}

export function formatDetail(data: unknown): string | undefined {
  if (data === undefined) return undefined;
  if (typeof data === 'string') return data;
  if (data instanceof Error) return data.message;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export function createAgentLogger(agent: string, options: AgentLoggerOptions = {}): AgentLogger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    const record: AgentLogRecord = {
      ts: Date.now(),
      agent,
      level,
      message,
      detail: formatDetail(data),
      workflowId: options.workflowId,
    };
    options.sink?.(record);

    if (process.env.LOG_LEVEL === 'debug' || level === 'error') {
      const scope = options.workflowId ? `${agent}:${options.workflowId.slice(0, 8)}` : agent;
      console.log(`[${scope}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  };

  return {
    agent,
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    success: (message, data) => write('success', message, data),
    child: (name) => createAgentLogger(name, options),
  };
}
