import { EndBehaviorType, VoiceConnectionStatus } from '@discordjs/voice';
import { opus } from 'prism-media';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { AudioSink, CaptureHandle } from '../models/types';
import { PCM_CHANNELS, PCM_SAMPLE_RATE } from '../utils/audio';
import { logger } from '../utils/logger';

export interface RecordableConnection {
  joinConfig: { guildId: string; channelId: string | null };
  state: { status: VoiceConnectionStatus };
  receiver: {
    speaking: {
      on(event: 'start', listener: (userId: string) => void): unknown;
      off(event: 'start', listener: (userId: string) => void): unknown;
    };
    subscribe(
      userId: string,
      options: { end: { behavior: EndBehaviorType.AfterSilence; duration: number } }
    ): Readable;
  };
  destroy(): void;
}

const SILENCE_END_MS = 1000;
const OPUS_FRAME_SIZE = 960;

export class RecorderService implements CaptureHandle {
  private connection: RecordableConnection;
  private sink?: AudioSink;
  private streams = new Map<string, Readable>(); // userId -> live Opus stream
  private readonly onSpeakingStart = (userId: string) => this.subscribe(userId);

  constructor(connection: RecordableConnection) {
    this.connection = connection;
  }

  isConnected(): boolean {
    const { status } = this.connection.state;
    return status !== VoiceConnectionStatus.Destroyed && status !== VoiceConnectionStatus.Disconnected;
  }

  isRecording(): boolean {
    return this.sink !== undefined;
  }

  startRecording(sink: AudioSink): void {
    if (this.sink) {
      throw new Error(`Already recording in guild ${this.connection.joinConfig.guildId}`);
    }
    this.sink = sink;
    this.connection.receiver.speaking.on('start', this.onSpeakingStart);

    logger.info(`Recording started in guild ${this.connection.joinConfig.guildId}`, {
      channelId: this.connection.joinConfig.channelId,
    });
  }

  stopRecording(): void {
    if (!this.sink) return;

    this.connection.receiver.speaking.off('start', this.onSpeakingStart);
    this.sink = undefined;

    for (const stream of this.streams.values()) {
      stream.destroy();
    }
    this.streams.clear();

    logger.info(`Recording stopped in guild ${this.connection.joinConfig.guildId}`);
  }

  disconnect(): void {
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }

  private subscribe(userId: string): void {
    const sink = this.sink;
    if (!sink || this.streams.has(userId)) return;

    const opusStream = this.connection.receiver.subscribe(userId, {
      end: { behavior: EndBehaviorType.AfterSilence, duration: SILENCE_END_MS },
    });
    this.streams.set(userId, opusStream);

    const decoder = new opus.Decoder({ rate: PCM_SAMPLE_RATE, channels: PCM_CHANNELS, frameSize: OPUS_FRAME_SIZE });
    const forward = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        sink(userId, chunk);
        callback();
      },
    });

    void pipeline(opusStream, decoder, forward)
      .catch((error: unknown) => {
        if (this.sink) {
          logger.warn(`Audio stream for user ${userId} ended with an error`, error);
        }
      })
      .finally(() => {
        if (this.streams.get(userId) === opusStream) {
          this.streams.delete(userId);
        }
      });
  }
}
