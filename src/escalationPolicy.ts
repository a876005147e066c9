import { FailureState } from "./types";
import { Notifier } from "./notifier";
import { formatEscalation } from "./alertFormatter";
import { logger } from "./logger";

const MS_PER_HOUR = 60 * 60 * 1000;

export const DEFAULT_ERROR_REPORT_INTERVAL_HOURS = 4;

export interface EscalationPolicyOptions {
  intervalHours?: number;
  now?: () => Date;
  initialState?: FailureState;
}

export function initialFailureState(): FailureState {
  return { consecutiveFailures: 0, lastEscalationTime: null };
}

/**
 * Decides when scrape failures reach the operator. The first failure
 * escalates at once; later ones are counted but held back until the
 * interval since the last escalation has passed.
 */
export class ErrorEscalationPolicy {
  private readonly intervalHours: number;
  private readonly now: () => Date;
  private failureState: FailureState;

  constructor(
    private readonly notifier: Notifier,
    options: EscalationPolicyOptions = {}
  ) {
    this.intervalHours = options.intervalHours ?? DEFAULT_ERROR_REPORT_INTERVAL_HOURS;
    this.now = options.now ?? (() => new Date());
    this.failureState = options.initialState
      ? { ...options.initialState }
      : initialFailureState();
  }

  get state(): Readonly<FailureState> {
    return this.failureState;
  }

  /** Returns true when this failure was escalated. */
  async reportFailure(errorType: string, details: string): Promise<boolean> {
    const failureCount = this.failureState.consecutiveFailures + 1;
    this.failureState = { ...this.failureState, consecutiveFailures: failureCount };
    logger.warn(`Scraping error (${errorType}): ${details} [failure #${failureCount}]`);

    const now = this.now();
    const last = this.failureState.lastEscalationTime;
    const hoursSinceLast = last ? (now.getTime() - last.getTime()) / MS_PER_HOUR : null;

    if (hoursSinceLast !== null && hoursSinceLast < this.intervalHours) {
      const hoursUntilNext = this.intervalHours - hoursSinceLast;
      logger.debug(`Suppressing error report (next report in ${hoursUntilNext.toFixed(1)} hours)`);
      return false;
    }

    this.failureState = { ...this.failureState, lastEscalationTime: now };
    await this.notifier.send(
      formatEscalation(errorType, details, failureCount, this.intervalHours)
    );
    return true;
  }

  reportSuccess(): void {
    if (this.failureState.consecutiveFailures > 0) {
      logger.info(`Scraping recovered after ${this.failureState.consecutiveFailures} failures`);
      this.failureState = { ...this.failureState, consecutiveFailures: 0 };
    }
  }
}
