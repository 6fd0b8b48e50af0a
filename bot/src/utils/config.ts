import dotenv from 'dotenv';
import { AudioFormat, Config } from '../models/types';

dotenv.config();

type Env = Record<string, string | undefined>;

function getRequiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

function getOptionalEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value ? value : undefined;
}

function getNumberEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function getAudioFormat(env: Env): AudioFormat {
  const raw = env.AUDIO_FORMAT || 'wav';
  if (raw !== 'wav' && raw !== 'mp3') {
    throw new Error(`AUDIO_FORMAT must be "wav" or "mp3", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env): Config {
  return {
    discord: {
      token: getRequiredEnv(env, 'DISCORD_BOT_TOKEN'),
      clientId: getRequiredEnv(env, 'DISCORD_CLIENT_ID'),
      devGuildId: getOptionalEnv(env, 'DISCORD_GUILD_ID'),
    },
    services: {
      geminiApiKey: getOptionalEnv(env, 'GEMINI_API_KEY'),
      geminiBaseUrl: env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com/v1beta',
      geminiUploadUrl: env.GEMINI_UPLOAD_URL || 'https://generativelanguage.googleapis.com/upload/v1beta',
      geminiModel: env.GEMINI_MODEL || 'gemini-2.0-flash',
    },
    storage: {
      databasePath: env.DATABASE_PATH || 'bot_settings.db',
      tempAudioDir: env.TEMP_AUDIO_DIR || 'temp_audio',
    },
    audio: {
      format: getAudioFormat(env),
    },
    scheduler: {
      statusUpdateSeconds: getNumberEnv(env, 'STATUS_UPDATE_SECONDS', 60),
    },
    observability: {
      otlpEndpoint: getOptionalEnv(env, 'OTLP_ENDPOINT'),
      otlpApiKey: getOptionalEnv(env, 'OTLP_API_KEY'),
    },
  };
}

export const config: Config = loadConfig(process.env);
