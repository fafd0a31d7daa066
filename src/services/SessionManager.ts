import { Logger } from "../utils/logger";
import { MixSession } from "./MixSession";

export type SessionFactory = () => Promise<MixSession>;

export class SessionManager {
  private sessions = new Map<number, MixSession>();
  private pending = new Map<number, Promise<MixSession>>();
  private logger = new Logger("SessionManager");
  private expiryInterval?: NodeJS.Timeout;

  constructor(
    private readonly createSession: SessionFactory = () => MixSession.create()
  ) {}

  getSession(userId: number): MixSession | undefined {
    return this.sessions.get(userId);
  }

  // Sessions are created on first use
  async getOrCreateSession(userId: number): Promise<MixSession> {
    const existing = this.sessions.get(userId);
    if (existing) {
      existing.touch();
      return existing;
    }

    let creating = this.pending.get(userId);
    if (!creating) {
      creating = this.createSession();
      this.pending.set(userId, creating);
    }

    try {
      const session = await creating;
      this.sessions.set(userId, session);
      return session;
    } finally {
      this.pending.delete(userId);
    }
  }

  async deleteSession(userId: number): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    this.sessions.delete(userId);
    await session.dispose();
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }

  async cleanupOldSessions(maxAgeHours: number = 24): Promise<number> {
    const threshold = Date.now() - maxAgeHours * 60 * 60 * 1000;
    let cleaned = 0;

    for (const [userId, session] of [...this.sessions.entries()]) {
      if (session.lastActivity < threshold) {
        await this.deleteSession(userId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.log(`Cleaned up ${cleaned} old sessions`);
    }

    return cleaned;
  }

  startExpiry(maxAgeHours: number, intervalMs: number = 60 * 60 * 1000): void {
    this.stopExpiry();
    this.expiryInterval = setInterval(() => {
      this.cleanupOldSessions(maxAgeHours).catch((error) => {
        this.logger.error("Session cleanup failed:", error);
      });
    }, intervalMs);
    this.expiryInterval.unref();
  }

  stopExpiry(): void {
    if (this.expiryInterval) {
      clearInterval(this.expiryInterval);
      this.expiryInterval = undefined;
    }
  }

  async destroy(): Promise<void> {
    this.stopExpiry();
    const userIds = [...this.sessions.keys()];
    await Promise.all(userIds.map((userId) => this.deleteSession(userId)));
  }
}
