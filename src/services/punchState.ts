import { formatISO, fromUnixTime } from 'date-fns';
import type { Logger } from 'pino';
import type { TimerStateStore } from '../config';
import type { PunchAction } from '../site/contract';

export type PunchStatus = PunchAction | 'unknown';

export interface PunchSnapshot {
  status: PunchStatus;
  /** Epoch seconds, set only while clocked in. */
  clockInTime: number | null;
}

export type PunchListener = (snapshot: PunchSnapshot) => void;

export interface PunchStateDeps {
  store: TimerStateStore;
  logger: Logger;
  now?: () => Date;
}

const toEpochSeconds = (date: Date) => date.getTime() / 1000;

/**
 * Current punch status plus the clock-in timestamp. Every change is written to the timer file
 * before listeners are told about it.
 */
export class PunchState {
  private status: PunchStatus = 'unknown';
  private clockInTime: number | null = null;
  private readonly listeners = new Set<PunchListener>();
  private readonly now: () => Date;

  constructor(private readonly deps: PunchStateDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  snapshot(): PunchSnapshot {
    return { status: this.status, clockInTime: this.clockInTime };
  }

  subscribe(listener: PunchListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Loads the stored timestamp; status stays unknown until the dashboard is inspected. */
  async restore(): Promise<void> {
    const stored = await this.deps.store.load();
    this.clockInTime = stored.clockInTime;
    this.deps.logger.debug(
      { clockedInAt: stored.clockInTime === null ? null : formatISO(fromUnixTime(stored.clockInTime)) },
      'Restored timer state'
    );
    this.emit();
  }

  /** Applies a status read off the dashboard. An existing clock-in time is kept while still clocked in. */
  async recordDetected(status: PunchStatus): Promise<void> {
    if (status === 'in') {
      if (this.clockInTime === null) {
        this.clockInTime = toEpochSeconds(this.now());
        await this.persist();
      }
    } else {
      this.clockInTime = null;
      await this.persist();
    }
    this.setStatus(status);
  }

  /** Applies a clock action the site confirmed. Clocking in restarts the timer. */
  async recordAction(action: PunchAction): Promise<void> {
    this.clockInTime = action === 'in' ? toEpochSeconds(this.now()) : null;
    await this.persist();
    this.setStatus(action);
  }

  private setStatus(status: PunchStatus) {
    if (status !== this.status) {
      this.deps.logger.info({ from: this.status, to: status }, 'Punch status changed');
    }
    this.status = status;
    this.emit();
  }

  private persist() {
    return this.deps.store.save({ clockInTime: this.clockInTime });
  }

  private emit() {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
