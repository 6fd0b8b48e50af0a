import { Client, Events, GatewayIntentBits, Interaction } from 'discord.js';
import { config } from './utils/config';
import { logger } from './utils/logger';
import { observabilityService } from './services/observability';
import { VoiceManager } from './services/voiceManager';
import { GeminiAnalyzer } from './services/geminiAnalyzer';
import { ArtifactPipeline } from './services/artifactPipeline';
import { createArtifactConverter } from './services/audioConverters';
import { SqliteSettingsStore } from './services/settingsStore';
import { DiscordNameResolver } from './services/nameResolver';
import { GuildSession } from './services/guildSession';
import { SessionRegistry } from './services/sessionRegistry';
import { CommandRouter } from './services/commandRouter';

class VoiceInsightBot {
  private client: Client;
  private settingsStore: SqliteSettingsStore;
  private registry: SessionRegistry;
  private router: CommandRouter;
  private shuttingDown = false;

  constructor(settingsStore: SqliteSettingsStore) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
    });

    this.settingsStore = settingsStore;

    const analyzer = new GeminiAnalyzer({
      baseUrl: config.services.geminiBaseUrl,
      uploadUrl: config.services.geminiUploadUrl,
      model: config.services.geminiModel,
    });
    const pipeline = new ArtifactPipeline(config.storage.tempAudioDir, createArtifactConverter(config.audio.format));
    const nameResolver = new DiscordNameResolver(this.client);

    this.registry = new SessionRegistry(
      guildId =>
        new GuildSession(guildId, {
          settingsStore: this.settingsStore,
          analyzer,
          pipeline,
          nameResolver,
          defaultCredential: config.services.geminiApiKey,
          statusUpdateSeconds: config.scheduler.statusUpdateSeconds,
        })
    );

    this.router = new CommandRouter({
      registry: this.registry,
      voice: new VoiceManager(),
      settingsStore: this.settingsStore,
      hasDefaultCredential: Boolean(config.services.geminiApiKey),
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, () => void this.onReady());
    this.client.on(Events.InteractionCreate, (interaction: Interaction) => void this.router.handleInteraction(interaction));
    this.client.on(Events.Error, (error) => logger.error('Discord client error', error));
    this.client.on(Events.Warn, (warning) => logger.warn('Discord client warning', { warning }));

    process.on('SIGINT', () => void this.shutdown());
    process.on('SIGTERM', () => void this.shutdown());
  }

  private async onReady(): Promise<void> {
    if (!this.client.user) return;

    logger.info(`Bot logged in as ${this.client.user.tag}`, {
      userId: this.client.user.id,
      guildCount: this.client.guilds.cache.size,
    });

    try {
      await this.router.registerCommands(config.discord.token, config.discord.clientId, config.discord.devGuildId);
    } catch (error) {
      logger.error('Failed to register slash commands', error);
    }
  }

  async start(): Promise<void> {
    observabilityService.initialize();
    await this.client.login(config.discord.token);
  }

  private async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    logger.info('Shutting down...', { activeSessions: this.registry.size });

    try {
      await this.registry.shutdown(true);
      await this.client.destroy();
      this.settingsStore.close();
      await observabilityService.shutdown();

      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
  }
}

SqliteSettingsStore.open(config.storage.databasePath)
  .then((settingsStore) => new VoiceInsightBot(settingsStore).start())
  .catch((error) => {
    logger.error('Failed to start bot', error);
    process.exit(1);
  });
