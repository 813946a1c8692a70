/**
 * Per-workflow progress log with broadcast.
 *
 * Events are append-only and numbered from 1. A subscriber first receives
 * everything already recorded, then follows live events until the terminal
 * (COMPLETE) event. Subscribing after completion replays the full history.
 */

import type { ProgressEvent } from '@boardscout/schemas';

export type ProgressEventInput = Omit<ProgressEvent, 'workflowId' | 'seq' | 'timestamp'>;

interface WorkflowLog {
  events: ProgressEvent[];
  done: boolean;
  waiters: Set<() => void>;
}

export class ProgressStream {
  private readonly logs = new Map<string, WorkflowLog>();

  open(workflowId: string): void {
    if (!this.logs.has(workflowId)) {
      this.logs.set(workflowId, { events: [], done: false, waiters: new Set() });
    }
  }

  has(workflowId: string): boolean {
    return this.logs.has(workflowId);
  }

  /** Record an event. Ignored once the workflow's terminal event is in. */
  append(workflowId: string, input: ProgressEventInput): ProgressEvent | null {
    const log = this.logs.get(workflowId);
    if (!log || log.done) return null;

    const event: ProgressEvent = {
      ...input,
      workflowId,
      seq: log.events.length + 1,
      timestamp: new Date().toISOString(),
    };
    log.events.push(event);
    if (event.stage === 'COMPLETE') log.done = true;
    this.wake(log);
    return event;
  }

  history(workflowId: string): ProgressEvent[] {
    return [...(this.logs.get(workflowId)?.events ?? [])];
  }

  isDone(workflowId: string): boolean {
    return this.logs.get(workflowId)?.done ?? false;
  }

  /**
   * Replay then follow. Returns null for an unknown workflow. Breaking out
   * of the loop, or aborting `signal`, detaches the subscriber and nothing
   * else; an abort also ends a follower that is waiting for the next event.
   */
  subscribe(workflowId: string, signal?: AbortSignal): AsyncIterable<ProgressEvent> | null {
    const log = this.logs.get(workflowId);
    if (!log) return null;
    return follow(log, signal);
  }

  /** Subscribers currently waiting for the next event. */
  followers(workflowId: string): number {
    return this.logs.get(workflowId)?.waiters.size ?? 0;
  }

  delete(workflowId: string): void {
    const log = this.logs.get(workflowId);
    if (!log) return;
    log.done = true;
    this.wake(log);
    this.logs.delete(workflowId);
  }

  private wake(log: WorkflowLog): void {
    const waiters = [...log.waiters];
    log.waiters.clear();
    for (const resolve of waiters) resolve();
  }
}

async function* follow(
  log: WorkflowLog,
  signal?: AbortSignal,
): AsyncGenerator<ProgressEvent, void, undefined> {
  let index = 0;
  for (;;) {
    if (signal?.aborted) return;
    while (index < log.events.length) {
      const event = log.events[index++];
      if (event) yield event;
    }
    if (log.done) return;
    await new Promise<void>((resolve) => {
      const wake = () => {
        log.waiters.delete(wake);
        signal?.removeEventListener('abort', wake);
        resolve();
      };
      log.waiters.add(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }
}
