import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { EndBehaviorType, VoiceConnectionStatus } from '@discordjs/voice';
import { opus } from 'prism-media';
import { RecordableConnection, RecorderService } from '../recorder';

jest.mock('@discordjs/voice', () => ({
  EndBehaviorType: { AfterSilence: 1 },
  VoiceConnectionStatus: {
    Signalling: 'signalling',
    Connecting: 'connecting',
    Ready: 'ready',
    Disconnected: 'disconnected',
    Destroyed: 'destroyed',
  },
}));

// Decoding is replaced by a pass-through so test bytes arrive unchanged
jest.mock('prism-media', () => {
  const { PassThrough: MockPassThrough } = jest.requireActual<typeof import('stream')>('stream');
  return { opus: { Decoder: jest.fn(() => new MockPassThrough()) } };
});

class FakeConnection implements RecordableConnection {
  joinConfig = { guildId: 'guild-1', channelId: 'voice-1' };
  state: { status: VoiceConnectionStatus } = { status: VoiceConnectionStatus.Ready };
  speaking = new EventEmitter();
  streams: PassThrough[] = [];
  receiver = {
    speaking: this.speaking,
    subscribe: jest.fn((_userId: string) => {
      const stream = new PassThrough();
      this.streams.push(stream);
      return stream;
    }),
  };
  destroy = jest.fn(() => {
    this.state = { status: VoiceConnectionStatus.Destroyed };
  });
}

async function settle(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

describe('RecorderService', () => {
  let connection: FakeConnection;
  let recorder: RecorderService;
  let sink: jest.Mock<void, [string, Buffer]>;

  beforeEach(() => {
    connection = new FakeConnection();
    recorder = new RecorderService(connection);
    sink = jest.fn<void, [string, Buffer]>();
  });

  afterEach(() => {
    recorder.stopRecording();
  });

  it('should subscribe to a speaker once they start talking', () => {
    recorder.startRecording(sink);

    connection.speaking.emit('start', 'user-1');

    expect(connection.receiver.subscribe).toHaveBeenCalledWith('user-1', {
      end: { behavior: EndBehaviorType.AfterSilence, duration: 1000 },
    });
    expect(opus.Decoder).toHaveBeenCalledWith({ rate: 48000, channels: 2, frameSize: 960 });
  });

  it('should forward decoded audio to the sink under the speaker id', async () => {
    // Arrange
    recorder.startRecording(sink);
    connection.speaking.emit('start', 'user-1');

    // Act
    connection.streams[0].write(Buffer.from([1, 2, 3]));
    await settle();

    // Assert
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0][0]).toBe('user-1');
    expect([...sink.mock.calls[0][1]]).toEqual([1, 2, 3]);
  });

  it('should keep one subscription per speaker while the stream is live', () => {
    recorder.startRecording(sink);

    connection.speaking.emit('start', 'user-1');
    connection.speaking.emit('start', 'user-1');
    connection.speaking.emit('start', 'user-2');

    expect(connection.receiver.subscribe).toHaveBeenCalledTimes(2);
  });

  it('should subscribe again after the stream ends on silence', async () => {
    recorder.startRecording(sink);
    connection.speaking.emit('start', 'user-1');

    connection.streams[0].end();
    await settle();
    connection.speaking.emit('start', 'user-1');

    expect(connection.receiver.subscribe).toHaveBeenCalledTimes(2);
  });

  it('should refuse to start twice', () => {
    recorder.startRecording(sink);

    expect(() => recorder.startRecording(sink)).toThrow('Already recording in guild guild-1');
  });

  it('should detach and destroy live streams on stop', async () => {
    recorder.startRecording(sink);
    connection.speaking.emit('start', 'user-1');

    recorder.stopRecording();
    await settle();

    expect(recorder.isRecording()).toBe(false);
    expect(connection.speaking.listenerCount('start')).toBe(0);
    expect(connection.streams[0].destroyed).toBe(true);

    connection.speaking.emit('start', 'user-2');
    expect(connection.receiver.subscribe).toHaveBeenCalledTimes(1);
  });

  it('should report the connection state', () => {
    expect(recorder.isConnected()).toBe(true);

    connection.state = { status: VoiceConnectionStatus.Disconnected };
    expect(recorder.isConnected()).toBe(false);
  });

  it('should destroy the connection only once', () => {
    recorder.disconnect();
    recorder.disconnect();

    expect(connection.destroy).toHaveBeenCalledTimes(1);
    expect(recorder.isConnected()).toBe(false);
  });
});
