import { PublishTarget, SessionState } from '../models/types';
import { SessionAlreadyActiveError } from '../models/errors';
import { logger } from '../utils/logger';
import { ConnectFn, GuildSession } from './guildSession';

export type SessionFactory = (guildId: string) => GuildSession;

export class SessionRegistry {
  private sessions = new Map<string, GuildSession>();
  private createSession: SessionFactory;

  constructor(createSession: SessionFactory) {
    this.createSession = createSession;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(guildId: string): GuildSession | undefined {
    return this.sessions.get(guildId);
  }

  getOrCreate(guildId: string): GuildSession {
    let session = this.sessions.get(guildId);
    if (!session) {
      session = this.createSession(guildId);
      this.sessions.set(guildId, session);
    }
    return session;
  }

  isActive(guildId: string): boolean {
    const session = this.sessions.get(guildId);
    return session !== undefined && session.state !== SessionState.IDLE;
  }

  async startSession(guildId: string, connect: ConnectFn, target: PublishTarget): Promise<GuildSession> {
    const session = this.getOrCreate(guildId);
    try {
      await session.start(connect, target);
    } catch (error) {
      if (!(error instanceof SessionAlreadyActiveError) && session.state === SessionState.IDLE) {
        this.deleteIfCurrent(guildId, session);
      }
      throw error;
    }
    return session;
  }

  /**
   * Stops the guild's session and drops it from the registry. The entry is
   * deleted even when the stop sequence throws.
   */
  async remove(guildId: string, skipFinal = false): Promise<boolean> {
    const session = this.sessions.get(guildId);
    if (!session) return false;

    try {
      await session.stop(skipFinal);
    } finally {
      this.deleteIfCurrent(guildId, session);
    }
    return true;
  }

  async shutdown(skipFinal = true): Promise<void> {
    const guildIds = [...this.sessions.keys()];
    const results = await Promise.allSettled(guildIds.map(guildId => this.remove(guildId, skipFinal)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error(`Failed to stop session for guild ${guildIds[index]}`, result.reason);
      }
    });
    logger.info('All capture sessions stopped', { count: guildIds.length });
  }

  private deleteIfCurrent(guildId: string, session: GuildSession): void {
    if (this.sessions.get(guildId) === session) {
      this.sessions.delete(guildId);
    }
  }
}
