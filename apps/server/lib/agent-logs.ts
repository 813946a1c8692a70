/**
 * In-memory agent log buffer behind /api/logs.
 * Keeps the most recent entries from every workflow and scheduled pass.
 */

import type { AgentLogRecord, LogSink } from '@boardscout/core';

export interface AgentLogEntry extends AgentLogRecord {
  id: string;
}

const MAX_LOGS = 500;

export class AgentLogBuffer {
  private readonly logs: AgentLogEntry[] = [];
  private nextId = 1;

  constructor(private readonly maxLogs = MAX_LOGS) {}

  /** Pass to createAgentLogger as its sink. */
  readonly sink: LogSink = (record) => {
    this.push(record);
  };

  push(record: AgentLogRecord): AgentLogEntry {
    const entry: AgentLogEntry = { id: `log-${this.nextId++}`, ...record };
    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) this.logs.shift();
    return entry;
  }

  /** Entries after `afterId`; everything retained when the id is unknown or absent. */
  list(afterId?: string): AgentLogEntry[] {
    if (!afterId) return [...this.logs];
    const idx = this.logs.findIndex((l) => l.id === afterId);
    if (idx < 0) return [...this.logs];
    return this.logs.slice(idx + 1);
  }

  clear(): void {
    this.logs.length = 0;
  }
}
