import { ThreadAutoArchiveDuration } from 'discord.js';
import { MessageHandle, PublishTarget, ThreadHandle } from '../models/types';
import { logger } from '../utils/logger';

interface SentMessage {
  id: string;
  edit(content: string): Promise<unknown>;
}

interface ThreadLike {
  id: string;
  send(content: string): Promise<unknown>;
}

export interface ThreadableChannel {
  id: string;
  send(content: string): Promise<SentMessage>;
  threads: {
    create(options: {
      name: string;
      startMessage: string;
      autoArchiveDuration: ThreadAutoArchiveDuration;
    }): Promise<ThreadLike>;
  };
}

const MAX_THREAD_NAME_LENGTH = 100;

export class ChannelPublisher implements PublishTarget {
  private channel: ThreadableChannel;

  constructor(channel: ThreadableChannel) {
    this.channel = channel;
  }

  async send(text: string): Promise<MessageHandle> {
    const message = await this.channel.send(text);
    return {
      id: message.id,
      edit: async (content: string) => {
        await message.edit(content);
      },
    };
  }

  async createThread(message: MessageHandle, title: string): Promise<ThreadHandle> {
    const thread = await this.channel.threads.create({
      name: title.slice(0, MAX_THREAD_NAME_LENGTH),
      startMessage: message.id,
      autoArchiveDuration: ThreadAutoArchiveDuration.OneHour,
    });

    logger.debug(`Created report thread ${thread.id}`, { channelId: this.channel.id, title });

    return {
      send: async (text: string) => {
        await thread.send(text);
      },
    };
  }
}
