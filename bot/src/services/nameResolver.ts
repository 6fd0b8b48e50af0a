import { NameResolver } from '../models/types';
import { logger } from '../utils/logger';

export function fallbackSpeakerName(speakerId: string): string {
  return `User_${speakerId}`;
}

interface Named {
  displayName: string;
}

export interface NameSource {
  guilds: { cache: { get(guildId: string): { members: { cache: { get(userId: string): Named | undefined } } } | undefined } };
  users: {
    cache: { get(userId: string): Named | undefined };
    fetch(userId: string): Promise<Named>;
  };
}

// Not cached: names can change mid-session
export class DiscordNameResolver implements NameResolver {
  private client: NameSource;

  constructor(client: NameSource) {
    this.client = client;
  }

  async resolve(guildId: string, speakerId: string): Promise<string> {
    const member = this.client.guilds.cache.get(guildId)?.members.cache.get(speakerId);
    if (member) return member.displayName;

    const cachedUser = this.client.users.cache.get(speakerId);
    if (cachedUser) return cachedUser.displayName;

    try {
      const user = await this.client.users.fetch(speakerId);
      return user.displayName;
    } catch (error) {
      logger.debug(`Could not fetch user ${speakerId}`, { guildId, error: error instanceof Error ? error.message : String(error) });
      return fallbackSpeakerName(speakerId);
    }
  }
}
