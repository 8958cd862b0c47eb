/**
 * Poll Scheduler
 *
 * Drives the poll loop on a fixed interval:
 * - First poll immediately on start, then one per tick
 * - Ticks arriving while a poll is in flight are skipped
 * - Unreachable appliance: exponential backoff capped at maxBackoffSeconds
 * - Rejected credentials: one fresh attempt, then paused until resume()
 * - Shutdown abandons the in-flight poll within a bounded timeout
 */

import { EventEmitter } from 'events';
import {
  POLLER_EVENTS,
  POLLING_DEFAULTS,
  type PollFailureKind,
  type SchedulerState,
  type SchedulerStatus,
} from '@dnspresence/shared';
import type { SessionProvider } from '../../services/appliance/session.js';
import type { DeviceSource } from '../../services/appliance/types.js';
import type { PresenceSink } from '../../services/presenceSink.js';
import {
  AuthenticationError,
  MalformedResponseError,
  SessionExpiredError,
  UnreachableError,
} from '../../utils/errors.js';
import { toSinkRecord } from './sinkMapper.js';
import type {
  DeviceMerger,
  PollSchedulerEvents,
  PollSkippedEvent,
  PresenceUpdate,
  SchedulerConfig,
} from './types.js';

export interface PollSchedulerDeps {
  sessions: SessionProvider;
  source: DeviceSource;
  reconciler: DeviceMerger;
  sink: PresenceSink;
  now?: () => Date;
}

/**
 * Map a poll error onto the failure kind that decides the scheduler's reaction
 */
export function classifyPollFailure(error: unknown): PollFailureKind {
  if (error instanceof AuthenticationError || error instanceof SessionExpiredError) {
    return 'authentication';
  }
  if (error instanceof UnreachableError) return 'unreachable';
  if (error instanceof MalformedResponseError) return 'malformed';
  return 'unknown';
}

/**
 * Backoff window after the nth consecutive failure
 *
 * @example
 * backoffMs(1, 30, 300) // 30000
 * backoffMs(3, 30, 300) // 120000
 * backoffMs(6, 30, 300) // 300000
 */
export function backoffMs(failures: number, intervalSeconds: number, maxBackoffSeconds: number): number {
  const exponent = Math.max(0, failures - 1);
  return Math.min(intervalSeconds * 2 ** exponent, maxBackoffSeconds) * 1000;
}

/**
 * @example
 * const scheduler = new PollScheduler(
 *   { pollIntervalSeconds: 30, maxBackoffSeconds: 300 },
 *   { sessions, source: client, reconciler, sink: store }
 * );
 * scheduler.on('poll:failed', ({ kind, message }) => { ... });
 * scheduler.start();
 */
export class PollScheduler extends EventEmitter {
  private state: SchedulerState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private stopping = false;

  private consecutiveFailures = 0;
  private authFailures = 0;
  private lastPollAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private lastFailure: { kind: PollFailureKind; message: string } | null = null;
  private nextAttemptAt: Date | null = null;

  private readonly now: () => Date;

  constructor(
    private readonly config: SchedulerConfig,
    private readonly deps: PollSchedulerDeps
  ) {
    super();
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.stopping) {
      console.warn('[Poller] Cannot start a stopped scheduler');
      return;
    }
    if (this.timer) {
      console.log('[Poller] Already running');
      return;
    }

    const intervalMs = this.config.pollIntervalSeconds * 1000;
    console.log(`[Poller] Starting with ${intervalMs}ms interval`);

    // Run immediately on start
    this.tick();

    this.timer = setInterval(() => this.tick(), intervalMs);
  }

  /**
   * Stop ticking, abandon any in-flight poll (waiting at most timeoutMs) and log out
   */
  async stop(timeoutMs: number = POLLING_DEFAULTS.SHUTDOWN_TIMEOUT_MS): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const inFlight = this.inFlight;
    if (inFlight) {
      this.controller?.abort();
      let timeout: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        inFlight.then(() => false),
        new Promise<boolean>((resolve) => {
          timeout = setTimeout(() => resolve(true), timeoutMs);
        }),
      ]);
      clearTimeout(timeout);
      if (timedOut) {
        console.warn(`[Poller] In-flight poll did not settle within ${timeoutMs}ms, abandoning it`);
      }
    }

    this.setState('stopped');
    await this.deps.sessions.close();
    console.log('[Poller] Stopped');
  }

  /**
   * Force an immediate poll, ignoring any backoff window.
   * Returns false when a poll is already running or polling is paused or stopped.
   */
  triggerPoll(): boolean {
    if (this.stopping || this.state === 'polling' || this.state === 'paused') {
      return false;
    }
    void this.runPoll();
    return true;
  }

  /**
   * Leave the paused state after repeated authentication failures,
   * optionally with new credentials, and poll right away
   */
  async resume(password?: string): Promise<boolean> {
    if (this.state !== 'paused' || this.stopping) return false;

    if (password !== undefined) {
      await this.deps.sessions.updatePassword(password);
    } else {
      this.deps.sessions.invalidate();
    }
    this.authFailures = 0;
    this.nextAttemptAt = null;
    console.log('[Poller] Resuming after authentication pause');
    this.setState('idle');
    return this.triggerPoll();
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      intervalSeconds: this.config.pollIntervalSeconds,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
      consecutiveFailures: this.consecutiveFailures,
      lastFailure: this.lastFailure ? { ...this.lastFailure } : null,
      nextAttemptAt: this.nextAttemptAt?.toISOString() ?? null,
    };
  }

  // ==========================================================================
  // Poll Loop
  // ==========================================================================

  private tick(): void {
    if (this.state === 'polling') {
      console.warn('[Poller] Previous poll still running, skipping tick');
      this.skip('overlap');
      return;
    }
    if (this.state === 'paused') {
      this.skip('paused');
      return;
    }
    // A retry is due on the tick nearest nextAttemptAt
    const slackMs = (this.config.pollIntervalSeconds * 1000) / 2;
    if (
      this.state === 'backing_off' &&
      this.nextAttemptAt !== null &&
      this.now().getTime() < this.nextAttemptAt.getTime() - slackMs
    ) {
      this.skip('backoff');
      return;
    }
    void this.runPoll();
  }

  private runPoll(): Promise<void> {
    const startedAt = this.now();
    const controller = new AbortController();
    this.lastPollAt = startedAt;
    this.controller = controller;
    this.setState('polling');

    const poll = this.executePoll(startedAt, controller.signal)
      .catch((error: unknown) => {
        console.error('[Poller] Poll failed unexpectedly:', error);
        // No state event here, a throwing listener is the usual cause
        if (this.state === 'polling') this.state = 'idle';
      })
      .finally(() => {
        if (this.inFlight === poll) {
          this.inFlight = null;
          this.controller = null;
        }
      });
    this.inFlight = poll;
    return poll;
  }

  private async executePoll(startedAt: Date, signal: AbortSignal): Promise<void> {
    let updates: PresenceUpdate[];
    try {
      const records = await this.deps.sessions.withSession((session) =>
        this.deps.source.fetchDevices(session, signal)
      );
      // Never apply a merge once shutdown has begun
      if (this.stopping) return;
      updates = this.deps.reconciler.merge(records, this.now());
    } catch (error) {
      if (this.stopping) {
        console.log('[Poller] Poll abandoned during shutdown');
        return;
      }
      await this.handleFailure(startedAt, error);
      return;
    }

    await this.handleSuccess(startedAt, updates);
  }

  private async handleSuccess(startedAt: Date, updates: PresenceUpdate[]): Promise<void> {
    this.consecutiveFailures = 0;
    this.authFailures = 0;
    this.lastFailure = null;
    this.nextAttemptAt = null;
    this.lastSuccessAt = this.now();

    try {
      await this.deps.sink.publish(updates.map(toSinkRecord));
      await this.deps.sink.setAvailability(true, null);
    } catch (error) {
      console.error('[Poller] Failed to publish presence updates:', error);
    }

    const transitions = updates.filter((u) => u.transition !== null).length;
    if (transitions > 0) {
      console.log(`[Poller] Poll complete: ${updates.length} devices, ${transitions} transitions`);
    }

    this.setState('idle');
    this.emitEvent(POLLER_EVENTS.POLL_SUCCESS, {
      startedAt,
      durationMs: this.now().getTime() - startedAt.getTime(),
      devices: updates.length,
      transitions,
    });
  }

  private async handleFailure(startedAt: Date, error: unknown): Promise<void> {
    const kind = classifyPollFailure(error);
    const message = error instanceof Error ? error.message : String(error);
    this.consecutiveFailures += 1;
    this.lastFailure = { kind, message };
    this.nextAttemptAt = null;

    let next: SchedulerState = 'backing_off';
    if (kind === 'authentication') {
      this.authFailures += 1;
      this.deps.sessions.invalidate();
      if (this.authFailures >= 2) {
        next = 'paused';
        console.error(`[Poller] Authentication failed again, polling paused until resumed: ${message}`);
      } else {
        console.warn(`[Poller] Authentication failed, retrying with a fresh session: ${message}`);
      }
    } else if (kind === 'malformed') {
      this.authFailures = 0;
      console.error(`[Poller] Malformed appliance response: ${message}`);
    } else {
      this.authFailures = 0;
      const delay = backoffMs(
        this.consecutiveFailures,
        this.config.pollIntervalSeconds,
        this.config.maxBackoffSeconds
      );
      this.nextAttemptAt = new Date(startedAt.getTime() + delay);
      console.error(`[Poller] Poll failed (${kind}), backing off ${delay / 1000}s: ${message}`);
    }

    try {
      await this.deps.sink.setAvailability(false, message);
    } catch (sinkError) {
      console.error('[Poller] Failed to update appliance availability:', sinkError);
    }

    this.setState(next);
    this.emitEvent(POLLER_EVENTS.POLL_FAILED, {
      startedAt,
      kind,
      message,
      consecutiveFailures: this.consecutiveFailures,
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private skip(reason: PollSkippedEvent['reason']): void {
    this.emitEvent(POLLER_EVENTS.POLL_SKIPPED, { at: this.now(), reason });
  }

  private setState(next: SchedulerState): void {
    const from = this.state;
    if (from === next || from === 'stopped') return;
    this.state = next;
    this.emitEvent(POLLER_EVENTS.STATE_CHANGED, { from, to: next });
  }

  private emitEvent<K extends keyof PollSchedulerEvents>(
    event: K,
    payload: PollSchedulerEvents[K]
  ): void {
    this.emit(event, payload);
  }
}
