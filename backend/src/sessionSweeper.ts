import { getLogger } from "./logger.js";
import { SessionStore } from "./sessionStore.js";
import { SweepTarget } from "./types.js";
import { UsageLimiter } from "./usageLimiter.js";
import { UserTaskQueue } from "./userTaskQueue.js";

const log = getLogger("sweeper");

/** Delivers timeout notices; the transport lives outside this service. */
export interface SweepDispatcher {
  warn(target: SweepTarget): Promise<void>;
  expire(target: SweepTarget): Promise<void>;
}

export type SweepReport = {
  warned: string[];
  expired: string[];
  notifyFailures: string[];
  staleUsageRemoved: number;
};

export class SessionSweeper {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<SweepReport> | null = null;

  constructor(
    private readonly sessions: SessionStore,
    private readonly usage: UsageLimiter,
    private readonly dispatcher: SweepDispatcher,
    private readonly intervalMs: number,
    private readonly queue: UserTaskQueue = new UserTaskQueue()
  ) {}

  /**
   * One pass: warn idle sessions, expire overdue ones, forget stale usage.
   * A failed notice is logged and never blocks cleanup of that user or the
   * rest of the pass.
   */
  async runCycle(): Promise<SweepReport> {
    const report: SweepReport = { warned: [], expired: [], notifyFailures: [], staleUsageRemoved: 0 };

    for (const target of this.sessions.sweepWarnings()) {
      report.warned.push(target.userId);
      await this.notify("warn", target, report);
    }

    for (const target of this.sessions.sweepExpirations()) {
      const removed = await this.queue.run(target.userId, () => this.sessions.expireIfDue(target.userId));
      if (!removed) {
        continue;
      }
      report.expired.push(target.userId);
      await this.notify("expire", target, report);
    }

    report.staleUsageRemoved = this.usage.sweepStale();
    if (report.warned.length || report.expired.length) {
      log.info("Sweep finished", {
        warned: report.warned.length,
        expired: report.expired.length,
        failures: report.notifyFailures.length
      });
    }
    return report;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    log.info("Session sweeper started", { intervalMs: this.intervalMs });
    this.timer = setInterval(() => {
      if (this.running) {
        return;
      }
      this.running = this.runCycle();
      void this.running
        .catch((error: unknown) => {
          log.error("Sweep cycle failed", { error });
        })
        .finally(() => {
          this.running = null;
        });
    }, this.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("Session sweeper stopped");
    }
    if (this.running) {
      await this.running.catch(() => undefined);
    }
  }

  private async notify(kind: "warn" | "expire", target: SweepTarget, report: SweepReport): Promise<void> {
    if (!target.channel) {
      return;
    }
    try {
      if (kind === "warn") {
        await this.dispatcher.warn(target);
      } else {
        await this.dispatcher.expire(target);
      }
    } catch (error) {
      report.notifyFailures.push(target.userId);
      log.error("Failed to notify user", { userId: target.userId, kind, error });
    }
  }
}

/** Dispatcher used when no notification transport is configured. */
export function createLoggingDispatcher(): SweepDispatcher {
  return {
    async warn(target) {
      log.info("Session expiring soon", { userId: target.userId, channel: target.channel });
    },
    async expire(target) {
      log.info("Session expired", { userId: target.userId, channel: target.channel });
    }
  };
}
