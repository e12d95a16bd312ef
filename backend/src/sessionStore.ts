import { getLogger } from "./logger.js";
import { removeArtifact } from "./services/fileStorage.js";
import { SessionMode, SessionState, SessionUpdate, SweepTarget } from "./types.js";

const log = getLogger("sessions");

export type SessionTimeouts = {
  /** Inactivity before a warning is due. */
  warningMs: number;
  /** Expiry for sessions without a document. */
  idleMs: number;
  /** Expiry for sessions holding a document. */
  extendedMs: number;
};

export type SessionStoreOptions = SessionTimeouts & {
  now?: () => number;
  removeFile?: (filePath: string) => Promise<unknown>;
};

/**
 * One editable document per user. Registry updates are synchronous; artifact
 * deletion happens after the record has already changed.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly timeouts: SessionTimeouts;
  private readonly now: () => number;
  private readonly removeFile: (filePath: string) => Promise<unknown>;

  constructor(options: SessionStoreOptions) {
    this.timeouts = {
      warningMs: options.warningMs,
      idleMs: options.idleMs,
      extendedMs: options.extendedMs
    };
    this.now = options.now || Date.now;
    this.removeFile = options.removeFile || removeArtifact;
  }

  /** Starts a fresh session, discarding any previous one for the user. */
  async create(userId: string, mode: SessionMode, channel?: string): Promise<SessionState> {
    const previous = this.sessions.get(userId);
    const now = this.now();
    const session: SessionState = {
      userId,
      mode,
      createdAt: now,
      lastActivity: now,
      warningSent: false,
      channel,
      occurrences: [],
      pendingFixes: [],
      appliedFixes: [],
      skippedFixes: []
    };
    this.sessions.set(userId, session);
    log.info("Session created", { userId, mode });

    if (previous?.filePath) {
      await this.removeFile(previous.filePath);
    }
    return session;
  }

  get(userId: string): SessionState | undefined {
    return this.sessions.get(userId);
  }

  get size(): number {
    return this.sessions.size;
  }

  update(userId: string, fields: SessionUpdate): SessionState | undefined {
    const session = this.sessions.get(userId);
    if (!session) {
      return undefined;
    }
    Object.assign(session, fields);
    this.touch(session);
    return session;
  }

  updateActivity(userId: string): boolean {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    this.touch(session);
    return true;
  }

  setChannel(userId: string, channel: string): void {
    const session = this.sessions.get(userId);
    if (session) {
      session.channel = channel;
    }
  }

  /** Attaches the uploaded document; a previously attached one is disposed. */
  async setFile(userId: string, filePath: string, originalName: string): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    const previous = session.filePath;
    session.filePath = filePath;
    session.originalName = originalName;
    this.touch(session);
    log.info("File set", { userId, originalName });

    if (previous && previous !== filePath) {
      await this.removeFile(previous);
    }
    return true;
  }

  /** Swaps in a revised artifact and deletes the one it replaces. */
  async updateFile(userId: string, newFilePath: string): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    const previous = session.filePath;
    session.filePath = newFilePath;
    this.touch(session);

    if (previous && previous !== newFilePath) {
      await this.removeFile(previous);
    }
    return true;
  }

  getFilePath(userId: string): string | undefined {
    return this.sessions.get(userId)?.filePath;
  }

  getOriginalName(userId: string): string | undefined {
    return this.sessions.get(userId)?.originalName;
  }

  hasFile(userId: string): boolean {
    return !!this.sessions.get(userId)?.filePath;
  }

  isActive(userId: string): boolean {
    return this.sessions.has(userId);
  }

  /** Removes the session and its artifact. Cleaning an absent session is a no-op. */
  async cleanup(userId: string): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    this.sessions.delete(userId);
    log.info("Session cleaned up", { userId });

    if (session.filePath) {
      await this.removeFile(session.filePath);
    }
    return true;
  }

  /**
   * Removes the session only if it is still overdue when called. A session
   * recreated or refreshed since the sweep listed it is left alone.
   */
  async expireIfDue(userId: string): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session || this.now() - session.lastActivity < this.expiryFor(session)) {
      return false;
    }
    this.sessions.delete(userId);
    log.info("Session expired", { userId });

    if (session.filePath) {
      await this.removeFile(session.filePath);
    }
    return true;
  }

  markWarningSent(userId: string): void {
    const session = this.sessions.get(userId);
    if (session) {
      session.warningSent = true;
    }
  }

  isWarningSent(userId: string): boolean {
    return this.sessions.get(userId)?.warningSent ?? false;
  }

  /**
   * Sessions idle past the warning threshold that have not been warned yet
   * and have not expired. They are marked as warned before being returned.
   */
  sweepWarnings(): SweepTarget[] {
    const now = this.now();
    const due: SweepTarget[] = [];
    for (const session of this.sessions.values()) {
      const elapsed = now - session.lastActivity;
      if (session.warningSent || elapsed < this.timeouts.warningMs || elapsed >= this.expiryFor(session)) {
        continue;
      }
      session.warningSent = true;
      due.push({ userId: session.userId, channel: session.channel ?? null });
    }
    return due;
  }

  /** Sessions idle past their expiry: the extended one with a document, the idle one without. */
  sweepExpirations(): SweepTarget[] {
    const now = this.now();
    const expired: SweepTarget[] = [];
    for (const session of this.sessions.values()) {
      if (now - session.lastActivity >= this.expiryFor(session)) {
        expired.push({ userId: session.userId, channel: session.channel ?? null });
      }
    }
    return expired;
  }

  /** Whole seconds left before the session expires; 0 when absent. */
  timeoutRemaining(userId: string): number {
    const session = this.sessions.get(userId);
    if (!session) {
      return 0;
    }
    const remainingMs = this.expiryFor(session) - (this.now() - session.lastActivity);
    return Math.max(0, Math.floor(remainingMs / 1000));
  }

  async dispose(): Promise<void> {
    const userIds = Array.from(this.sessions.keys());
    for (const userId of userIds) {
      await this.cleanup(userId);
    }
  }

  private expiryFor(session: SessionState): number {
    return session.filePath ? this.timeouts.extendedMs : this.timeouts.idleMs;
  }

  private touch(session: SessionState): void {
    session.lastActivity = this.now();
    session.warningSent = false;
  }
}
