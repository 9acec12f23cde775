import type { BeginResult, EndResult, WorkPeriod } from "./types";
import { StorageService } from "./storage";
import { TraccError } from "./errors";
import { findOpenPeriod, formatTimestamp, lastPeriod } from "./periodUtils";

export type Clock = () => Date;

export class Tracker {
  private readonly storage: StorageService;
  private readonly now: Clock;

  constructor(storage: StorageService, now: Clock = () => new Date()) {
    this.storage = storage;
    this.now = now;
  }

  async begin(): Promise<BeginResult> {
    const periods = await this.storage.loadPeriods();
    const previous = lastPeriod(periods);

    if (previous && previous.end === null) {
      throw new TraccError(
        "ALREADY_TRACKING",
        `Cannot start period. Current period started at ${formatTimestamp(
          previous.start
        )} is still running.`
      );
    }

    // Periods never overlap, even if the clock was set back since the last end
    const startTime = this.now();
    const start =
      previous?.end && startTime.getTime() < Date.parse(previous.end)
        ? previous.end
        : startTime.toISOString();

    const period: WorkPeriod = { start, end: null };
    await this.storage.savePeriods([...periods, period]);

    return previous ? { period, previous } : { period };
  }

  async end(): Promise<EndResult> {
    const periods = await this.storage.loadPeriods();
    const current = findOpenPeriod(periods);

    if (!current) {
      const last = lastPeriod(periods);
      throw new TraccError(
        "NOT_TRACKING",
        last?.end
          ? `Cannot end period. Last period has already been ended at ${formatTimestamp(
              last.end
            )}.`
          : "Cannot end period. No period has been started yet."
      );
    }

    const stopTime = this.now();
    const end =
      stopTime.getTime() < Date.parse(current.start)
        ? current.start
        : stopTime.toISOString();

    const period: WorkPeriod = { start: current.start, end };
    await this.storage.savePeriods([...periods.slice(0, -1), period]);

    return { period };
  }

  async list(): Promise<WorkPeriod[]> {
    return this.storage.loadPeriods();
  }
}
