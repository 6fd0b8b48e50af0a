import {
  ChannelType,
  ChatInputCommandInteraction,
  EmbedBuilder,
  Interaction,
  PermissionFlagsBits,
  REST,
  Routes,
  SlashCommandBuilder,
} from 'discord.js';
import { ANALYSIS_MODES, CaptureHandle, CycleOutcome, CycleStatus, SettingsStore } from '../models/types';
import { SessionAlreadyActiveError, SettingsValidationError, TransportError } from '../models/errors';
import { logger } from '../utils/logger';
import { ChannelPublisher, ThreadableChannel } from './publisher';
import { SessionRegistry } from './sessionRegistry';
import { isAnalysisMode, MIN_RECORDING_INTERVAL } from './settingsStore';
import { ConnectOptions, JoinableVoiceChannel } from './voiceManager';

export const commandDefinitions = [
  new SlashCommandBuilder()
    .setName('analyze_start')
    .setDescription('Join your voice channel and start periodic discussion analysis')
    .setDMPermission(false),
  new SlashCommandBuilder()
    .setName('analyze_stop')
    .setDescription('Stop the analysis and leave the voice channel')
    .setDMPermission(false)
    .addBooleanOption(option =>
      option.setName('skip_final').setDescription('Leave without creating a final report')
    ),
  new SlashCommandBuilder()
    .setName('analyze_now')
    .setDescription('Analyze the audio captured since the last report right away')
    .setDMPermission(false),
  new SlashCommandBuilder()
    .setName('analyze_status')
    .setDescription('Show the state of the analysis in this server')
    .setDMPermission(false),
  new SlashCommandBuilder()
    .setName('settings')
    .setDescription('Configure the analysis for this server')
    .setDMPermission(false)
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .addSubcommand(sub =>
      sub
        .setName('set_key')
        .setDescription('Set the Gemini API key used for this server')
        .addStringOption(option => option.setName('key').setDescription('Gemini API key').setRequired(true))
    )
    .addSubcommand(sub =>
      sub
        .setName('set_mode')
        .setDescription('Choose the analysis mode')
        .addStringOption(option =>
          option
            .setName('mode')
            .setDescription('Analysis mode')
            .setRequired(true)
            .addChoices(...ANALYSIS_MODES.map(mode => ({ name: mode, value: mode })))
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('set_interval')
        .setDescription('Set the time between scheduled analyses')
        .addIntegerOption(option =>
          option
            .setName('seconds')
            .setDescription(`Interval in seconds (at least ${MIN_RECORDING_INTERVAL})`)
            .setRequired(true)
            .setMinValue(MIN_RECORDING_INTERVAL)
        )
    )
    .addSubcommand(sub => sub.setName('show').setDescription('Show the current settings')),
];

export interface CommandReply {
  content?: string;
  embeds?: EmbedBuilder[];
  ephemeral?: boolean;
}

export interface CommandContext {
  commandName: string;
  subcommand: string | null;
  guildId: string;
  voiceChannel: JoinableVoiceChannel | null;
  textChannel: ThreadableChannel | null;
  getBoolean(name: string): boolean | null;
  getString(name: string): string | null;
  getInteger(name: string): number | null;
  reply(response: CommandReply): Promise<void>; // edits the reply once deferred
  defer(ephemeral?: boolean): Promise<void>;
  followUp(response: CommandReply): Promise<void>;
}

export interface VoiceConnector {
  connect(channel: JoinableVoiceChannel, options?: ConnectOptions): Promise<CaptureHandle>;
}

export interface CommandRouterDeps {
  registry: SessionRegistry;
  voice: VoiceConnector;
  settingsStore: SettingsStore;
  hasDefaultCredential?: boolean;
}

export const PRIVACY_NOTICE =
  '🎙️ Recording started. Voice in this channel is captured and sent to Google Gemini for analysis. ' +
  'Audio files are deleted after each report.';
const NOT_RUNNING = 'No analysis is running in this server.';

export function maskApiKey(key: string | null): string {
  if (!key) return 'Not set';
  if (key.length <= 8) return '••••';
  return `${key.slice(0, 4)}…${key.slice(-4)}`;
}

export function describeManualOutcome(outcome: CycleOutcome): string {
  switch (outcome.status) {
    case CycleStatus.PUBLISHED:
      return `✅ Report posted in thread "${outcome.threadTitle}".`;
    case CycleStatus.NO_AUDIO:
      return '🔇 No audio has been captured since the last report.';
    case CycleStatus.NO_ARTIFACTS:
      return '⚠️ The captured audio could not be processed.';
    case CycleStatus.FAILED:
      return '⚠️ The analysis did not complete. See the notice in this channel.';
    case CycleStatus.SKIPPED:
      return NOT_RUNNING;
  }
}

export class CommandRouter {
  private deps: CommandRouterDeps;

  constructor(deps: CommandRouterDeps) {
    this.deps = deps;
  }

  async registerCommands(token: string, clientId: string, devGuildId?: string): Promise<void> {
    const rest = new REST({ version: '10' }).setToken(token);
    const body = commandDefinitions.map(command => command.toJSON());
    const route = devGuildId
      ? Routes.applicationGuildCommands(clientId, devGuildId)
      : Routes.applicationCommands(clientId);

    await rest.put(route, { body });
    logger.info(`Registered ${body.length} slash commands`, { scope: devGuildId ? 'guild' : 'global' });
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
      return;
    }

    await this.handleCommand(toCommandContext(interaction));
  }

  async handleCommand(command: CommandContext): Promise<void> {
    try {
      switch (command.commandName) {
        case 'analyze_start':
          return await this.handleStart(command);
        case 'analyze_stop':
          return await this.handleStop(command);
        case 'analyze_now':
          return await this.handleNow(command);
        case 'analyze_status':
          return await this.handleStatus(command);
        case 'settings':
          return await this.handleSettings(command);
        default:
          logger.warn(`Unknown command ${command.commandName}`, { guildId: command.guildId });
      }
    } catch (error) {
      logger.error(`Command ${command.commandName} failed`, error);
      const message = error instanceof Error ? error.message : String(error);
      try {
        await command.reply({ content: `❌ Something went wrong: ${message}`, ephemeral: true });
      } catch (replyError) {
        logger.warn('Could not report command failure', replyError);
      }
    }
  }

  private async handleStart(command: CommandContext): Promise<void> {
    const { guildId, voiceChannel, textChannel } = command;

    if (!voiceChannel) {
      await command.reply({ content: 'Join a voice channel first.', ephemeral: true });
      return;
    }
    if (!textChannel) {
      await command.reply({ content: 'Run this command in a text channel so reports can be posted.', ephemeral: true });
      return;
    }
    if (this.deps.registry.isActive(guildId)) {
      await command.reply({ content: 'Analysis is already running.', ephemeral: true });
      return;
    }

    await command.defer();

    const connect = () =>
      this.deps.voice.connect(voiceChannel, { onDisconnect: () => void this.handleLostConnection(guildId) });

    try {
      await this.deps.registry.startSession(guildId, connect, new ChannelPublisher(textChannel));
    } catch (error) {
      if (error instanceof SessionAlreadyActiveError) {
        await command.reply({ content: 'Analysis is already running.' });
        return;
      }
      if (error instanceof TransportError) {
        logger.warn(`Failed to start analysis in guild ${guildId}`, error);
        await command.reply({ content: `❌ Could not join ${voiceChannel.name}: ${error.message}` });
        return;
      }
      throw error;
    }

    const settings = this.deps.settingsStore.get(guildId);
    const lines = [PRIVACY_NOTICE, `Mode: ${settings.analysisMode}, interval: ${settings.recordingInterval}s.`];
    if (!settings.apiKey && !this.deps.hasDefaultCredential) {
      lines.push('⚠️ No Gemini API key is set yet. Use `/settings set_key` before the first report.');
    }
    await command.reply({ content: lines.join('\n') });
  }

  private async handleStop(command: CommandContext): Promise<void> {
    const { guildId } = command;
    if (!this.deps.registry.isActive(guildId)) {
      await command.reply({ content: NOT_RUNNING, ephemeral: true });
      return;
    }

    const skipFinal = command.getBoolean('skip_final') ?? false;
    await command.reply({
      content: skipFinal ? '🛑 Stopping without a final report…' : '🛑 Stopping and creating the final report…',
    });

    await this.deps.registry.remove(guildId, skipFinal);
    await command.followUp({ content: '✅ Analysis finished.' });
  }

  private async handleNow(command: CommandContext): Promise<void> {
    const session = this.deps.registry.get(command.guildId);
    if (!session || !session.isCapturing()) {
      await command.reply({ content: NOT_RUNNING, ephemeral: true });
      return;
    }

    await command.defer();
    const outcome = await session.forceAnalysis();
    await command.reply({ content: describeManualOutcome(outcome) });
  }

  private async handleStatus(command: CommandContext): Promise<void> {
    const session = this.deps.registry.get(command.guildId);
    if (!session || !this.deps.registry.isActive(command.guildId)) {
      await command.reply({ content: NOT_RUNNING, ephemeral: true });
      return;
    }

    const status = session.getStatus();
    const lines = [
      `State: ${status.state}${status.connected ? '' : ' (voice disconnected)'}`,
      `Mode: ${status.analysisMode}`,
      `Interval: ${status.recordingInterval}s`,
      `Speakers buffered: ${status.bufferedSpeakers}`,
      `Cycles this session: ${status.cyclesCompleted}`,
    ];
    await command.reply({ content: lines.join('\n'), ephemeral: true });
  }

  private async handleSettings(command: CommandContext): Promise<void> {
    const { guildId } = command;
    const store = this.deps.settingsStore;

    try {
      switch (command.subcommand) {
        case 'set_key': {
          store.set(guildId, 'apiKey', command.getString('key') ?? '');
          await command.reply({ content: '🔑 API key saved.', ephemeral: true });
          return;
        }
        case 'set_mode': {
          const mode = command.getString('mode') ?? '';
          if (!isAnalysisMode(mode)) {
            throw new SettingsValidationError(`Mode must be one of: ${ANALYSIS_MODES.join(', ')}`);
          }
          store.set(guildId, 'analysisMode', mode);
          await command.reply({ content: `Analysis mode set to ${mode}.` });
          return;
        }
        case 'set_interval': {
          const seconds = command.getInteger('seconds') ?? 0;
          store.set(guildId, 'recordingInterval', seconds);
          await command.reply({ content: `Interval set to ${seconds}s. It applies from the next cycle.` });
          return;
        }
        case 'show': {
          await command.reply({ embeds: [this.settingsEmbed(guildId)], ephemeral: true });
          return;
        }
        default:
          await command.reply({ content: `Unknown settings command ${command.subcommand}.`, ephemeral: true });
      }
    } catch (error) {
      if (error instanceof SettingsValidationError) {
        await command.reply({ content: `⚠️ ${error.message}`, ephemeral: true });
        return;
      }
      throw error;
    }
  }

  private settingsEmbed(guildId: string): EmbedBuilder {
    const settings = this.deps.settingsStore.get(guildId);
    const keyLabel =
      !settings.apiKey && this.deps.hasDefaultCredential ? 'Not set (using the bot default)' : maskApiKey(settings.apiKey);

    return new EmbedBuilder()
      .setTitle('Analysis settings')
      .addFields(
        { name: 'Mode', value: settings.analysisMode, inline: true },
        { name: 'Interval', value: `${settings.recordingInterval}s`, inline: true },
        { name: 'API key', value: keyLabel }
      );
  }

  private async handleLostConnection(guildId: string): Promise<void> {
    logger.warn(`Voice connection lost in guild ${guildId}, ending session`);
    try {
      await this.deps.registry.remove(guildId, false);
    } catch (error) {
      logger.error(`Failed to end session after disconnect in guild ${guildId}`, error);
    }
  }
}

function toCommandContext(interaction: ChatInputCommandInteraction<'cached'>): CommandContext {
  const channel = interaction.channel;
  const textChannel =
    channel !== null && (channel.type === ChannelType.GuildText || channel.type === ChannelType.GuildAnnouncement)
      ? channel
      : null;

  return {
    commandName: interaction.commandName,
    subcommand: interaction.options.getSubcommand(false),
    guildId: interaction.guildId,
    voiceChannel: interaction.member.voice.channel,
    textChannel,
    getBoolean: name => interaction.options.getBoolean(name),
    getString: name => interaction.options.getString(name),
    getInteger: name => interaction.options.getInteger(name),
    reply: async response => {
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply({ content: response.content, embeds: response.embeds });
      } else {
        await interaction.reply({ content: response.content, embeds: response.embeds, ephemeral: response.ephemeral });
      }
    },
    defer: async ephemeral => {
      await interaction.deferReply({ ephemeral });
    },
    followUp: async response => {
      await interaction.followUp({ content: response.content, embeds: response.embeds, ephemeral: response.ephemeral });
    },
  };
}
