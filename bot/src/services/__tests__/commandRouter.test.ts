import { AudioSink, CaptureHandle, CycleStatus } from '../../models/types';
import { TransportError } from '../../models/errors';
import {
  CommandContext,
  CommandReply,
  CommandRouter,
  commandDefinitions,
  describeManualOutcome,
  maskApiKey,
  PRIVACY_NOTICE,
  VoiceConnector,
} from '../commandRouter';
import { GuildSession } from '../guildSession';
import { ThreadableChannel } from '../publisher';
import { SessionRegistry } from '../sessionRegistry';
import { SqliteSettingsStore } from '../settingsStore';
import { ConnectOptions, JoinableVoiceChannel } from '../voiceManager';

const GUILD_ID = 'guild-1';
const NOW = new Date(2024, 0, 5, 9, 7);

class StubCapture implements CaptureHandle {
  sink?: AudioSink;
  disconnected = false;

  isConnected(): boolean {
    return !this.disconnected;
  }

  isRecording(): boolean {
    return this.sink !== undefined;
  }

  startRecording(sink: AudioSink): void {
    this.sink = sink;
  }

  stopRecording(): void {
    this.sink = undefined;
  }

  disconnect(): void {
    this.disconnected = true;
  }
}

interface FakeCommand extends CommandContext {
  replies: CommandReply[];
  followUps: CommandReply[];
  deferrals: number;
}

function createCommand(commandName: string, overrides: Partial<CommandContext> = {}): FakeCommand {
  const command: FakeCommand = {
    commandName,
    subcommand: null,
    guildId: GUILD_ID,
    voiceChannel,
    textChannel,
    getBoolean: () => null,
    getString: () => null,
    getInteger: () => null,
    replies: [],
    followUps: [],
    deferrals: 0,
    reply: async response => {
      command.replies.push(response);
    },
    defer: async () => {
      command.deferrals++;
    },
    followUp: async response => {
      command.followUps.push(response);
    },
    ...overrides,
  };
  return command;
}

const voiceChannel: JoinableVoiceChannel = {
  id: 'voice-1',
  name: 'General',
  guildId: GUILD_ID,
  guild: { voiceAdapterCreator: () => ({ sendPayload: () => true, destroy: () => undefined }) },
};

const channelMessages: string[] = [];
const threadMessages: string[] = [];
const textChannel: ThreadableChannel = {
  id: 'text-1',
  send: async (content: string) => {
    channelMessages.push(content);
    return { id: `message-${channelMessages.length}`, edit: async () => undefined };
  },
  threads: {
    create: async () => ({
      id: 'thread-1',
      send: async (content: string) => {
        threadMessages.push(content);
      },
    }),
  },
};

async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

describe('CommandRouter', () => {
  let settingsStore: SqliteSettingsStore;
  let registry: SessionRegistry;
  let capture: StubCapture;
  let connect: jest.Mock<Promise<CaptureHandle>, [JoinableVoiceChannel, ConnectOptions | undefined]>;
  let router: CommandRouter;

  beforeEach(async () => {
    channelMessages.length = 0;
    threadMessages.length = 0;
    settingsStore = await SqliteSettingsStore.open(':memory:');
    registry = new SessionRegistry(
      guildId =>
        new GuildSession(guildId, {
          settingsStore,
          analyzer: { analyze: async () => ({ ok: true, report: 'Everyone agreed.' }) },
          pipeline: {
            convert: async raw => ({
              artifacts: new Map([...raw.keys()].map((id): [string, string] => [id, `${id}.wav`])),
              cleanup: [],
            }),
            cleanup: async () => undefined,
          },
          nameResolver: { resolve: async (_guildId, speakerId) => speakerId },
          now: () => NOW,
        })
    );
    capture = new StubCapture();
    connect = jest.fn<Promise<CaptureHandle>, [JoinableVoiceChannel, ConnectOptions | undefined]>(async () => capture);
    const voice: VoiceConnector = { connect };
    router = new CommandRouter({ registry, voice, settingsStore });
  });

  afterEach(async () => {
    await registry.shutdown(true);
    settingsStore.close();
  });

  describe('analyze_start', () => {
    it('should ask the user to join a voice channel first', async () => {
      const command = createCommand('analyze_start', { voiceChannel: null });

      await router.handleCommand(command);

      expect(command.replies).toEqual([{ content: 'Join a voice channel first.', ephemeral: true }]);
      expect(connect).not.toHaveBeenCalled();
    });

    it('should start a session and post the privacy notice', async () => {
      const command = createCommand('analyze_start');

      await router.handleCommand(command);

      expect(command.deferrals).toBe(1);
      expect(connect).toHaveBeenCalledWith(voiceChannel, { onDisconnect: expect.any(Function) });
      expect(registry.isActive(GUILD_ID)).toBe(true);
      expect(command.replies).toEqual([
        {
          content: [
            PRIVACY_NOTICE,
            'Mode: debate, interval: 300s.',
            '⚠️ No Gemini API key is set yet. Use `/settings set_key` before the first report.',
          ].join('\n'),
        },
      ]);
    });

    it('should leave out the key warning once a key is stored', async () => {
      settingsStore.set(GUILD_ID, 'apiKey', 'test-secret');
      const command = createCommand('analyze_start');

      await router.handleCommand(command);

      expect(command.replies[0].content).toBe(`${PRIVACY_NOTICE}\nMode: debate, interval: 300s.`);
    });

    it('should refuse to start twice', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      const second = createCommand('analyze_start');

      await router.handleCommand(second);

      expect(second.replies).toEqual([{ content: 'Analysis is already running.', ephemeral: true }]);
      expect(connect).toHaveBeenCalledTimes(1);
    });

    it('should report a voice channel that cannot be joined', async () => {
      connect.mockRejectedValueOnce(new TransportError('Could not join voice channel General'));
      const command = createCommand('analyze_start');

      await router.handleCommand(command);

      expect(command.replies).toEqual([
        { content: '❌ Could not join General: Could not join voice channel General' },
      ]);
      expect(registry.isActive(GUILD_ID)).toBe(false);
    });

    it('should end the session when the voice connection is lost', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      const options = connect.mock.calls[0][1];

      options?.onDisconnect?.();
      await flushPromises();

      expect(registry.get(GUILD_ID)).toBeUndefined();
      expect(capture.disconnected).toBe(true);
      expect(channelMessages).toEqual(['🔇 No audio was captured since the last report.']);
    });
  });

  describe('analyze_stop', () => {
    it('should say so when nothing is running', async () => {
      const command = createCommand('analyze_stop');

      await router.handleCommand(command);

      expect(command.replies).toEqual([{ content: 'No analysis is running in this server.', ephemeral: true }]);
    });

    it('should stop without a final report when asked to skip it', async () => {
      // Arrange
      await router.handleCommand(createCommand('analyze_start'));
      const command = createCommand('analyze_stop', { getBoolean: name => name === 'skip_final' });

      // Act
      await router.handleCommand(command);

      // Assert
      expect(command.replies).toEqual([{ content: '🛑 Stopping without a final report…' }]);
      expect(command.followUps).toEqual([{ content: '✅ Analysis finished.' }]);
      expect(capture.disconnected).toBe(true);
      expect(registry.isActive(GUILD_ID)).toBe(false);
      expect(channelMessages).toEqual([]);
    });

    it('should publish a final report from buffered audio', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      capture.sink?.('user-1', Buffer.from([1, 2, 3, 4]));
      const command = createCommand('analyze_stop');

      await router.handleCommand(command);

      expect(command.replies).toEqual([{ content: '🛑 Stopping and creating the final report…' }]);
      expect(channelMessages).toHaveLength(1);
      expect(threadMessages.join('')).toContain('Everyone agreed.');
    });
  });

  describe('analyze_now', () => {
    it('should report when no audio has been captured', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      const command = createCommand('analyze_now');

      await router.handleCommand(command);

      expect(command.deferrals).toBe(1);
      expect(command.replies).toEqual([{ content: '🔇 No audio has been captured since the last report.' }]);
    });

    it('should publish a report for buffered audio', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      capture.sink?.('user-1', Buffer.from([1, 2, 3, 4]));
      const command = createCommand('analyze_now');

      await router.handleCommand(command);

      expect(command.replies).toEqual([
        { content: '✅ Report posted in thread "Discussion report 2024-01-05 09:07".' },
      ]);
      expect(registry.isActive(GUILD_ID)).toBe(true);
    });

    it('should say so when nothing is running', async () => {
      const command = createCommand('analyze_now');

      await router.handleCommand(command);

      expect(command.replies).toEqual([{ content: 'No analysis is running in this server.', ephemeral: true }]);
    });
  });

  describe('analyze_status', () => {
    it('should describe the running session', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      capture.sink?.('user-1', Buffer.from([1, 2]));
      const command = createCommand('analyze_status');

      await router.handleCommand(command);

      expect(command.replies).toEqual([
        {
          content: ['State: capturing', 'Mode: debate', 'Interval: 300s', 'Speakers buffered: 1', 'Cycles this session: 0'].join(
            '\n'
          ),
          ephemeral: true,
        },
      ]);
    });
  });

  describe('analyze_status after a cycle', () => {
    it('should count cycles that published nothing', async () => {
      await router.handleCommand(createCommand('analyze_start'));
      await router.handleCommand(createCommand('analyze_now'));
      const command = createCommand('analyze_status');

      await router.handleCommand(command);

      expect(command.replies[0].content).toBe(
        ['State: capturing', 'Mode: debate', 'Interval: 300s', 'Speakers buffered: 0', 'Cycles this session: 1'].join('\n')
      );
      expect(channelMessages).toEqual([]);
    });
  });

  describe('settings', () => {
    it('should store a valid interval', async () => {
      const command = createCommand('settings', { subcommand: 'set_interval', getInteger: () => 600 });

      await router.handleCommand(command);

      expect(settingsStore.get(GUILD_ID).recordingInterval).toBe(600);
      expect(command.replies).toEqual([{ content: 'Interval set to 600s. It applies from the next cycle.' }]);
    });

    it('should reject an interval below the minimum', async () => {
      const command = createCommand('settings', { subcommand: 'set_interval', getInteger: () => 30 });

      await router.handleCommand(command);

      expect(settingsStore.get(GUILD_ID).recordingInterval).toBe(300);
      expect(command.replies).toEqual([
        { content: '⚠️ The interval must be a whole number of at least 60 seconds', ephemeral: true },
      ]);
    });

    it('should reject an unknown mode', async () => {
      const command = createCommand('settings', { subcommand: 'set_mode', getString: () => 'poetry' });

      await router.handleCommand(command);

      expect(command.replies).toEqual([{ content: '⚠️ Mode must be one of: debate, summary', ephemeral: true }]);
    });

    it('should show the settings with a masked key', async () => {
      settingsStore.set(GUILD_ID, 'apiKey', 'test-secret-key');
      settingsStore.set(GUILD_ID, 'analysisMode', 'summary');
      const command = createCommand('settings', { subcommand: 'show' });

      await router.handleCommand(command);

      expect(command.replies).toHaveLength(1);
      expect(command.replies[0].ephemeral).toBe(true);
      expect(command.replies[0].embeds?.[0].toJSON().fields).toEqual([
        { name: 'Mode', value: 'summary', inline: true },
        { name: 'Interval', value: '300s', inline: true },
        { name: 'API key', value: 'test…-key' },
      ]);
    });
  });

  it('should report unexpected handler errors to the user', async () => {
    jest.spyOn(registry, 'isActive').mockImplementationOnce(() => {
      throw new Error('registry unavailable');
    });
    const command = createCommand('analyze_stop');

    await router.handleCommand(command);

    expect(command.replies).toEqual([{ content: '❌ Something went wrong: registry unavailable', ephemeral: true }]);
  });
});

describe('maskApiKey', () => {
  it('should mask keys', () => {
    expect(maskApiKey(null)).toBe('Not set');
    expect(maskApiKey('short')).toBe('••••');
    expect(maskApiKey('abcd12345678wxyz')).toBe('abcd…wxyz');
  });
});

describe('describeManualOutcome', () => {
  it('should describe each outcome', () => {
    expect(describeManualOutcome({ status: CycleStatus.NO_ARTIFACTS })).toBe('⚠️ The captured audio could not be processed.');
    expect(describeManualOutcome({ status: CycleStatus.SKIPPED })).toBe('No analysis is running in this server.');
    expect(describeManualOutcome({ status: CycleStatus.FAILED, kind: 'empty_report', detail: 'The analysis returned no text' })).toBe(
      '⚠️ The analysis did not complete. See the notice in this channel.'
    );
  });
});

describe('commandDefinitions', () => {
  it('should define every command', () => {
    expect(commandDefinitions.map(command => command.name)).toEqual([
      'analyze_start',
      'analyze_stop',
      'analyze_now',
      'analyze_status',
      'settings',
    ]);
  });
});
