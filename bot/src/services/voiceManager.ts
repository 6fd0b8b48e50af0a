import { InternalDiscordGatewayAdapterCreator } from 'discord.js';
import {
  DiscordGatewayAdapterCreator,
  entersState,
  joinVoiceChannel,
  VoiceConnection,
  VoiceConnectionStatus,
} from '@discordjs/voice';
import { CaptureHandle } from '../models/types';
import { TransportError } from '../models/errors';
import { logger } from '../utils/logger';
import { observabilityService } from './observability';
import { RecorderService } from './recorder';

export interface JoinableVoiceChannel {
  id: string;
  name: string;
  guildId: string;
  guild: { voiceAdapterCreator: InternalDiscordGatewayAdapterCreator };
}

export interface ConnectOptions {
  onDisconnect?: () => void;
}

export class VoiceManager {
  private readyTimeoutMs: number;
  private reconnectGraceMs: number;

  constructor(readyTimeoutMs = 20000, reconnectGraceMs = 5000) {
    this.readyTimeoutMs = readyTimeoutMs;
    this.reconnectGraceMs = reconnectGraceMs;
  }

  async connect(channel: JoinableVoiceChannel, options: ConnectOptions = {}): Promise<CaptureHandle> {
    return observabilityService.executeWithSpan(
      'voice_manager.connect',
      async () => {
        const connection = joinVoiceChannel({
          channelId: channel.id,
          guildId: channel.guildId,
          adapterCreator: channel.guild.voiceAdapterCreator as DiscordGatewayAdapterCreator,
          selfDeaf: false,
          selfMute: true,
        });

        try {
          await entersState(connection, VoiceConnectionStatus.Ready, this.readyTimeoutMs);
        } catch (error) {
          if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
            connection.destroy();
          }
          throw new TransportError(`Could not join voice channel ${channel.name}`, { cause: error });
        }

        connection.on(VoiceConnectionStatus.Disconnected, () => {
          void this.handleDisconnect(connection, channel, options);
        });

        logger.info(`Bot joined voice channel ${channel.name}`, {
          guildId: channel.guildId,
          channelId: channel.id,
        });

        return new RecorderService(connection);
      },
      { guildId: channel.guildId, channelId: channel.id }
    );
  }

  private async handleDisconnect(
    connection: VoiceConnection,
    channel: JoinableVoiceChannel,
    options: ConnectOptions
  ): Promise<void> {
    try {
      // Reconnecting to a new channel or region; the connection recovers on its own
      await Promise.race([
        entersState(connection, VoiceConnectionStatus.Signalling, this.reconnectGraceMs),
        entersState(connection, VoiceConnectionStatus.Connecting, this.reconnectGraceMs),
      ]);
      logger.info(`Voice connection in ${channel.name} is reconnecting`, { guildId: channel.guildId });
    } catch (error) {
      logger.warn(`Bot disconnected from voice channel ${channel.name}`, {
        guildId: channel.guildId,
        error: error instanceof Error ? error.message : String(error),
      });
      options.onDisconnect?.();
    }
  }
}
