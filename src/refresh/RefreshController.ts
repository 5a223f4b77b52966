import { ErrorCode } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { CallerId, Nanos } from '../types/ids.js';
import type { RefreshState, RefreshStatus } from '../types/refresh.js';
import { RefreshPhase } from '../types/refresh.js';
import type { Result } from '../types/result.js';
import { err } from '../types/result.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { NANOS_PER_SECOND, nowNanos } from '../utils/time.js';

export interface RefreshControllerOptions {
  cooldownNs: Nanos;
  now?: () => Nanos;
  logger?: Logger;
}

export type RefreshJob = () => Promise<Result<string>>;

function emptyState(): RefreshState {
  return { lastSuccessTime: 0n, history: new Map() };
}

function ceilSeconds(value: Nanos): bigint {
  return (value + NANOS_PER_SECOND - 1n) / NANOS_PER_SECOND;
}

export class RefreshController {
  readonly cooldownNs: Nanos;
  private readonly nowFn: () => Nanos;
  private readonly logger: Logger;
  private state: RefreshState = emptyState();
  private inFlight = false;

  constructor(options: RefreshControllerOptions) {
    if (options.cooldownNs < 0n) {
      throw new RangeError('cooldownNs must not be negative');
    }
    this.cooldownNs = options.cooldownNs;
    this.nowFn = options.now ?? nowNanos;
    this.logger = options.logger ?? createLogger('refresh-controller');
  }

  isInFlight(): boolean {
    return this.inFlight;
  }

  phase(now: Nanos = this.nowFn()): RefreshPhase {
    if (this.inFlight) return RefreshPhase.FETCHING;
    return this.cooldownRemaining(now) > 0n ? RefreshPhase.COOLDOWN_ACTIVE : RefreshPhase.IDLE;
  }

  cooldownRemaining(now: Nanos = this.nowFn()): Nanos {
    if (this.state.lastSuccessTime === 0n) return 0n;
    const elapsed = now - this.state.lastSuccessTime;
    return elapsed >= this.cooldownNs ? 0n : this.cooldownNs - elapsed;
  }

  nextRefreshTime(): Nanos {
    if (this.state.lastSuccessTime === 0n) return 0n;
    return this.state.lastSuccessTime + this.cooldownNs;
  }

  async run(caller: CallerId, job: RefreshJob): Promise<Result<string>> {
    if (this.inFlight) {
      this.logger.info({ caller }, 'refresh rejected: already in flight');
      return err(
        // No retry time: it depends on when the running refresh finishes.
        serviceError(ErrorCode.RATE_LIMITED, 'Rate limited: a refresh is already in progress', { inFlight: true })
      );
    }
    const remaining = this.cooldownRemaining(this.nowFn());
    if (remaining > 0n) {
      this.logger.info({ caller, remainingNs: remaining.toString() }, 'refresh rejected: cooldown active');
      return err(
        serviceError(
          ErrorCode.RATE_LIMITED,
          `Rate limited: please wait ${ceilSeconds(remaining)} more seconds before refreshing`,
          { retryAfterNs: remaining }
        )
      );
    }

    this.inFlight = true;
    this.logger.info({ caller }, 'refresh started');
    try {
      const outcome = await job();
      if (outcome.ok) {
        const completedAt = this.nowFn();
        const history = new Map(this.state.history);
        history.set(caller, completedAt);
        this.state = { lastSuccessTime: completedAt, lastTriggeredBy: caller, history };
        this.logger.info({ caller }, 'refresh succeeded');
      } else {
        this.logger.warn({ caller, code: outcome.error.code }, `refresh failed: ${outcome.error.message}`);
      }
      return outcome;
    } finally {
      this.inFlight = false;
    }
  }

  status(now: Nanos = this.nowFn()): RefreshStatus {
    const status: RefreshStatus = {
      phase: this.phase(now),
      lastSuccessTime: this.state.lastSuccessTime,
      cooldownNs: this.cooldownNs,
      cooldownRemainingNs: this.cooldownRemaining(now)
    };
    if (this.state.lastTriggeredBy !== undefined) status.lastTriggeredBy = this.state.lastTriggeredBy;
    return status;
  }

  snapshot(): RefreshState {
    return { ...this.state, history: new Map(this.state.history) };
  }

  restore(state: RefreshState): void {
    this.state = { ...state, history: new Map(state.history) };
  }

  history(): Map<CallerId, Nanos> {
    return new Map(this.state.history);
  }
}
