export type AnalysisMode = 'debate' | 'summary';

export const ANALYSIS_MODES: readonly AnalysisMode[] = ['debate', 'summary'];

export interface GuildSettings {
  guildId: string;
  apiKey: string | null;
  analysisMode: AnalysisMode;
  recordingInterval: number; // seconds
}

export interface GuildSettingValues {
  apiKey: string;
  analysisMode: AnalysisMode;
  recordingInterval: number;
}

export type GuildSettingKey = keyof GuildSettingValues;

export interface SettingsStore {
  get(guildId: string): GuildSettings;
  set<K extends GuildSettingKey>(guildId: string, key: K, value: GuildSettingValues[K]): void;
}

export enum SessionState {
  IDLE = 'idle',
  STARTING = 'starting',
  CAPTURING = 'capturing',
  STOPPING = 'stopping'
}

export type AudioSink = (speakerId: string, chunk: Buffer) => void;

export interface CaptureHandle {
  isConnected(): boolean;
  isRecording(): boolean;
  startRecording(sink: AudioSink): void;
  stopRecording(): void;
  disconnect(): void;
}

export interface MessageHandle {
  id: string;
  edit(text: string): Promise<void>;
}

export interface ThreadHandle {
  send(text: string): Promise<void>;
}

export interface PublishTarget {
  send(text: string): Promise<MessageHandle>;
  createThread(message: MessageHandle, title: string): Promise<ThreadHandle>;
}

export interface NameResolver {
  resolve(guildId: string, speakerId: string): Promise<string>;
}

export interface ArtifactConverter {
  readonly extension: string;
  convert(rawPath: string): Promise<string>;
}

export interface ConvertedArtifacts {
  artifacts: Map<string, string>; // speakerId -> artifact path
  cleanup: string[];
}

export enum AnalysisFailureKind {
  NO_CREDENTIAL = 'no_credential',
  RATE_LIMITED = 'rate_limited',
  UPLOAD_FAILED = 'upload_failed',
  GENERIC_FAILURE = 'generic_failure'
}

export type AnalysisOutcome =
  | { ok: true; report: string }
  | { ok: false; kind: AnalysisFailureKind; detail: string };

export interface AnalysisRequest {
  artifacts: Map<string, string>;
  context: string;
  speakerNames: Map<string, string>;
  mode: AnalysisMode;
  credential: string | null;
}

export interface Analyzer {
  analyze(request: AnalysisRequest): Promise<AnalysisOutcome>;
}

export enum CycleTrigger {
  SCHEDULED = 'scheduled',
  MANUAL = 'manual',
  FINAL = 'final'
}

export enum CycleStatus {
  SKIPPED = 'skipped',
  NO_AUDIO = 'no_audio',
  NO_ARTIFACTS = 'no_artifacts',
  PUBLISHED = 'published',
  FAILED = 'failed'
}

export type CycleFailureKind = AnalysisFailureKind | 'empty_report';

export type CycleOutcome =
  | { status: CycleStatus.SKIPPED | CycleStatus.NO_AUDIO | CycleStatus.NO_ARTIFACTS }
  | { status: CycleStatus.PUBLISHED; report: string; threadTitle: string }
  | { status: CycleStatus.FAILED; kind: CycleFailureKind; detail: string };

export type AudioFormat = 'wav' | 'mp3';

export interface Config {
  discord: {
    token: string;
    clientId: string;
    devGuildId?: string;
  };
  services: {
    geminiApiKey?: string;
    geminiBaseUrl: string;
    geminiUploadUrl: string;
    geminiModel: string;
  };
  storage: {
    databasePath: string;
    tempAudioDir: string;
  };
  audio: {
    format: AudioFormat;
  };
  scheduler: {
    statusUpdateSeconds: number;
  };
  observability: {
    otlpEndpoint?: string;
    otlpApiKey?: string;
  };
}
