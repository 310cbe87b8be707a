import type { RateLimitConfig } from "../../types/config.js";
import { logger } from "../../infra/logger.js";

export interface ScheduleOptions {
  /** Bypass the limits and supersede pending sends for the same key */
  final?: boolean;
}

type Send = () => Promise<void>;

interface PendingSend {
  key: string;
  send: Send;
  final: boolean;
  resolve: (delivered: boolean) => void;
  reject: (error: unknown) => void;
}

/**
 * Delivery state for one display target
 */
interface TargetState {
  pending: PendingSend[];
  /** Delivery timestamps inside the burst window */
  deliveries: number[];
  lastDeliveryAt: number | null;
  inFlight: Promise<void> | null;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * DisplayRateLimiter - Paces display pushes per target
 *
 * Enforces a minimum interval between deliveries and a sliding-window burst
 * cap. Sends over the limit wait in FIFO order and are never dropped. A final
 * send jumps the queue: earlier pending sends for the same key resolve
 * undelivered and the final one goes out as soon as the in-flight send
 * settles.
 */
export class DisplayRateLimiter {
  private targets: Map<string, TargetState> = new Map();
  private disposed = false;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Queue a send. Resolves true once delivered, false when superseded or
   * disposed first; rejects with the send's own error.
   */
  schedule(target: string, key: string, send: Send, options: ScheduleOptions = {}): Promise<boolean> {
    if (this.disposed) {
      return Promise.resolve(false);
    }

    const state = this.getTarget(target);
    const final = options.final ?? false;

    return new Promise<boolean>((resolve, reject) => {
      const request: PendingSend = { key, send, final, resolve, reject };

      if (final) {
        const superseded = state.pending.filter((p) => p.key === key && !p.final);
        state.pending = state.pending.filter((p) => p.key !== key || p.final);
        for (const p of superseded) {
          p.resolve(false);
        }
        if (superseded.length > 0) {
          logger.debug(`Superseded ${superseded.length} pending update(s) for ${target}/${key}`);
        }
        // Ahead of queued non-final sends, behind earlier finals
        const firstNonFinal = state.pending.findIndex((p) => !p.final);
        if (firstNonFinal === -1) {
          state.pending.push(request);
        } else {
          state.pending.splice(firstNonFinal, 0, request);
        }
      } else {
        state.pending.push(request);
      }

      this.drain(target);
    });
  }

  /**
   * Sends waiting for a slot on a target
   */
  pendingCount(target: string): number {
    return this.targets.get(target)?.pending.length ?? 0;
  }

  /**
   * Milliseconds until a regular send to the target may be delivered
   */
  getWaitMs(target: string): number {
    const state = this.targets.get(target);
    return state ? this.waitFor(state) : 0;
  }

  /**
   * Cancel timers and resolve every pending send as undelivered
   */
  dispose(): void {
    this.disposed = true;
    for (const state of this.targets.values()) {
      if (state.timer) {
        clearTimeout(state.timer);
        state.timer = null;
      }
      for (const p of state.pending) {
        p.resolve(false);
      }
      state.pending = [];
    }
    this.targets.clear();
  }

  private getTarget(target: string): TargetState {
    let state = this.targets.get(target);
    if (!state) {
      state = { pending: [], deliveries: [], lastDeliveryAt: null, inFlight: null, timer: null };
      this.targets.set(target, state);
    }
    return state;
  }

  private waitFor(state: TargetState): number {
    const now = this.now();
    const windowStart = now - this.config.burstWindowMs;
    state.deliveries = state.deliveries.filter((ts) => ts > windowStart);

    let wait = 0;
    if (state.lastDeliveryAt !== null) {
      wait = Math.max(wait, state.lastDeliveryAt + this.config.minIntervalMs - now);
    }
    const oldest = state.deliveries[0];
    if (state.deliveries.length >= this.config.burstLimit && oldest !== undefined) {
      wait = Math.max(wait, oldest + this.config.burstWindowMs - now);
    }
    return wait;
  }

  private drain(target: string): void {
    const state = this.targets.get(target);
    if (!state || state.inFlight || this.disposed) {
      return;
    }

    const next = state.pending[0];
    if (!next) {
      return;
    }

    if (!next.final) {
      const wait = this.waitFor(state);
      if (wait > 0) {
        if (!state.timer) {
          state.timer = setTimeout(() => {
            state.timer = null;
            this.drain(target);
          }, wait);
        }
        return;
      }
    }

    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }

    state.pending.shift();
    const now = this.now();
    state.lastDeliveryAt = now;
    state.deliveries.push(now);

    state.inFlight = Promise.resolve()
      .then(() => next.send())
      .then(
        () => next.resolve(true),
        (error: unknown) => next.reject(error)
      )
      .finally(() => {
        state.inFlight = null;
        this.drain(target);
      });
  }
}
