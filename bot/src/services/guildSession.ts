import {
  AnalysisFailureKind,
  AnalysisOutcome,
  Analyzer,
  CaptureHandle,
  CycleOutcome,
  CycleStatus,
  CycleTrigger,
  GuildSettings,
  MessageHandle,
  NameResolver,
  PublishTarget,
  SessionState,
  SettingsStore,
} from '../models/types';
import { SessionAlreadyActiveError, TransportError } from '../models/errors';
import { sleep } from '../utils/async';
import { logger } from '../utils/logger';
import { AudioAccumulator } from './audioAccumulator';
import { ArtifactPipeline } from './artifactPipeline';
import { fallbackSpeakerName } from './nameResolver';
import { observabilityService } from './observability';
import {
  CONTEXT_LIMIT,
  NO_AUDIO_NOTICE,
  countdownMessage,
  failureNotice,
  formatTimestamp,
  reportHeader,
  splitReport,
  starterMessage,
  tailCodePoints,
  threadTitle,
} from './reportFormatter';
import { defaultGuildSettings } from './settingsStore';

export type ConnectFn = () => Promise<CaptureHandle>;

export type ArtifactStage = Pick<ArtifactPipeline, 'convert' | 'cleanup'>;

export interface GuildSessionDeps {
  settingsStore: SettingsStore;
  analyzer: Analyzer;
  pipeline: ArtifactStage;
  nameResolver: NameResolver;
  defaultCredential?: string; // for guilds without their own key
  statusUpdateSeconds?: number; // countdown edit period, 0 disables
  now?: () => Date;
}

export interface SessionStatus {
  state: SessionState;
  connected: boolean;
  analysisMode: GuildSettings['analysisMode'];
  recordingInterval: number;
  bufferedSpeakers: number;
  bufferedBytes: number;
  cyclesCompleted: number;
  startedAt: Date | null;
}

interface SchedulerTask {
  controller: AbortController;
  done: Promise<void>;
}

// Scheduled, manual and final cycles share one serial queue: a cycle's cleanup
// finishes before the next one flushes. handle and accumulator change together.
export class GuildSession {
  readonly guildId: string;
  private deps: GuildSessionDeps;
  private now: () => Date;

  private sessionState = SessionState.IDLE;
  private handle: CaptureHandle | null = null;
  private accumulator: AudioAccumulator | null = null;
  private target: PublishTarget | null = null;
  private context = '';
  private settings: GuildSettings;
  private scheduler: SchedulerTask | null = null;
  private queue: Promise<void> = Promise.resolve();
  private pendingStart: Promise<void> | null = null;
  private pendingStop: Promise<void> | null = null;
  private statusMessage: MessageHandle | null = null;
  private countdownActive = false;
  private statusUpdates: Promise<void> = Promise.resolve();
  private cyclesCompleted = 0;
  private startedAt: Date | null = null;

  constructor(guildId: string, deps: GuildSessionDeps) {
    this.guildId = guildId;
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.settings = defaultGuildSettings(guildId);
  }

  get state(): SessionState {
    return this.sessionState;
  }

  getContext(): string {
    return this.context;
  }

  isCapturing(): boolean {
    return this.sessionState === SessionState.CAPTURING && this.handle !== null && this.accumulator !== null;
  }

  getStatus(): SessionStatus {
    return {
      state: this.sessionState,
      connected: this.handle?.isConnected() ?? false,
      analysisMode: this.settings.analysisMode,
      recordingInterval: this.settings.recordingInterval,
      bufferedSpeakers: this.accumulator?.speakerCount() ?? 0,
      bufferedBytes: this.accumulator?.bufferedBytes() ?? 0,
      cyclesCompleted: this.cyclesCompleted,
      startedAt: this.startedAt,
    };
  }

  async start(connect: ConnectFn, target: PublishTarget): Promise<void> {
    if (this.sessionState !== SessionState.IDLE) {
      throw new SessionAlreadyActiveError(this.guildId);
    }

    this.sessionState = SessionState.STARTING;
    this.pendingStart = this.attach(connect, target);
    try {
      await this.pendingStart;
    } finally {
      this.pendingStart = null;
    }
  }

  async forceAnalysis(): Promise<CycleOutcome> {
    if (!this.isCapturing()) {
      return { status: CycleStatus.SKIPPED };
    }
    return this.enqueue(CycleTrigger.MANUAL);
  }

  async stop(skipFinal = false): Promise<void> {
    if (this.pendingStart) {
      try {
        await this.pendingStart;
      } catch {
        return; // start failed, nothing is attached
      }
    }

    if (this.pendingStop) return this.pendingStop;
    if (this.sessionState !== SessionState.CAPTURING) return;

    this.pendingStop = this.teardown(skipFinal);
    try {
      await this.pendingStop;
    } finally {
      this.pendingStop = null;
    }
  }

  private async attach(connect: ConnectFn, target: PublishTarget): Promise<void> {
    let handle: CaptureHandle;
    try {
      handle = await connect();
    } catch (error) {
      this.sessionState = SessionState.IDLE;
      throw error instanceof TransportError
        ? error
        : new TransportError(`Could not connect voice for guild ${this.guildId}`, { cause: error });
    }

    const accumulator = new AudioAccumulator();
    try {
      handle.startRecording((speakerId, chunk) => accumulator.append(speakerId, chunk));
    } catch (error) {
      this.releaseHandle(handle);
      this.sessionState = SessionState.IDLE;
      throw new TransportError(`Could not start recording in guild ${this.guildId}`, { cause: error });
    }

    this.handle = handle;
    this.accumulator = accumulator;
    this.target = target;
    this.context = '';
    this.cyclesCompleted = 0;
    this.startedAt = this.now();
    this.settings = this.readSettings();
    this.sessionState = SessionState.CAPTURING;

    const controller = new AbortController();
    this.scheduler = { controller, done: this.runScheduler(controller.signal) };

    logger.info(`Capture session started for guild ${this.guildId}`, {
      analysisMode: this.settings.analysisMode,
      recordingInterval: this.settings.recordingInterval,
    });
  }

  private async teardown(skipFinal: boolean): Promise<void> {
    this.sessionState = SessionState.STOPPING;
    logger.info(`Stopping capture session for guild ${this.guildId}`, { skipFinal });

    const scheduler = this.scheduler;
    this.scheduler = null;
    try {
      if (scheduler) {
        scheduler.controller.abort();
        await scheduler.done;
      }

      if (skipFinal) {
        await this.queue;
      } else {
        await this.enqueue(CycleTrigger.FINAL);
      }
      await this.statusUpdates;
    } catch (error) {
      logger.error(`Final cycle failed in guild ${this.guildId}, releasing voice anyway`, error);
    } finally {
      if (this.handle) {
        this.releaseHandle(this.handle);
      }

      this.handle = null;
      this.accumulator = null;
      this.target = null;
      this.statusMessage = null;
      this.sessionState = SessionState.IDLE;
    }

    logger.info(`Capture session stopped for guild ${this.guildId}`, { cyclesCompleted: this.cyclesCompleted });
  }

  private releaseHandle(handle: CaptureHandle): void {
    try {
      handle.stopRecording();
    } catch (error) {
      logger.warn(`Failed to stop recording in guild ${this.guildId}`, error);
    }
    try {
      handle.disconnect();
    } catch (error) {
      logger.warn(`Failed to disconnect voice in guild ${this.guildId}`, error);
    }
  }

  private async runScheduler(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const settings = this.readSettings();
        const elapsed = await this.waitForNextCycle(settings, signal);
        if (!elapsed) return;
        await this.enqueue(CycleTrigger.SCHEDULED);
      } catch (error) {
        logger.error(`Scheduler iteration failed in guild ${this.guildId}`, error);
      }
    }
  }

  private async waitForNextCycle(settings: GuildSettings, signal: AbortSignal): Promise<boolean> {
    const statusSeconds = this.deps.statusUpdateSeconds ?? 0;
    let remaining = settings.recordingInterval;

    this.statusMessage = null;
    this.countdownActive = true;
    this.queueCountdown(remaining, settings);

    while (remaining > 0) {
      const step = statusSeconds > 0 ? Math.min(statusSeconds, remaining) : remaining;
      if (!(await sleep(step * 1000, signal))) return false;
      remaining -= step;
      if (remaining > 0) this.queueCountdown(remaining, settings);
    }
    return true;
  }

  // Countdown updates run on their own chain so a slow edit never shifts the tick
  private queueCountdown(remainingSeconds: number, settings: GuildSettings): void {
    if (!this.deps.statusUpdateSeconds) return;
    this.statusUpdates = this.statusUpdates.then(() => this.updateCountdown(remainingSeconds, settings));
  }

  private async updateCountdown(remainingSeconds: number, settings: GuildSettings): Promise<void> {
    const target = this.target;
    if (!target || !this.countdownActive || this.sessionState !== SessionState.CAPTURING) return;

    const text = countdownMessage(remainingSeconds, settings.analysisMode);
    const message = this.statusMessage;
    try {
      if (message) {
        await message.edit(text);
      } else {
        this.statusMessage = await target.send(text);
      }
    } catch (error) {
      // Usually the message was deleted; stay quiet until the next cycle
      this.countdownActive = false;
      this.statusMessage = null;
      logger.debug(`Countdown update failed in guild ${this.guildId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private enqueue(trigger: CycleTrigger): Promise<CycleOutcome> {
    const run = this.queue.then(() => this.performAnalysis(trigger));
    this.queue = run.then(
      () => undefined,
      (error: unknown) => {
        logger.error(`Analysis cycle crashed in guild ${this.guildId}`, error);
      }
    );
    return run;
  }

  private async performAnalysis(trigger: CycleTrigger): Promise<CycleOutcome> {
    const accumulator = this.accumulator;
    const target = this.target;
    if (!accumulator || !this.handle || !target) {
      return { status: CycleStatus.SKIPPED };
    }

    const startedAt = this.now();
    const traceId = observabilityService.createCycleTraceId(this.guildId, startedAt.getTime());

    const outcome = await observabilityService.executeWithSpan(
      'guild_session.perform_analysis',
      () => this.runCycle(trigger, accumulator, target, startedAt),
      { guildId: this.guildId, trigger, traceId },
      result => ({ 'cycle.status': result.status })
    );

    this.cyclesCompleted++;
    logger.info(`Analysis cycle finished in guild ${this.guildId}`, { trigger, status: outcome.status, traceId });
    return outcome;
  }

  private async runCycle(
    trigger: CycleTrigger,
    accumulator: AudioAccumulator,
    target: PublishTarget,
    startedAt: Date
  ): Promise<CycleOutcome> {
    const raw = accumulator.flush();
    if (raw.size === 0) {
      if (trigger === CycleTrigger.FINAL) {
        await this.notify(target, NO_AUDIO_NOTICE);
      }
      return { status: CycleStatus.NO_AUDIO };
    }

    let cleanup: string[] = [];
    try {
      const speakerNames = await this.resolveNames([...raw.keys()]);
      const converted = await this.deps.pipeline.convert(raw, `${this.guildId}_${startedAt.getTime()}`);
      cleanup = converted.cleanup;

      if (converted.artifacts.size === 0) {
        logger.warn(`No speaker audio could be converted in guild ${this.guildId}`, { speakers: raw.size });
        return { status: CycleStatus.NO_ARTIFACTS };
      }

      this.settings = this.readSettings();
      const result = await this.deps.analyzer.analyze({
        artifacts: converted.artifacts,
        context: this.context,
        speakerNames,
        mode: this.settings.analysisMode,
        credential: this.settings.apiKey ?? this.deps.defaultCredential ?? null,
      });

      return await this.publish(trigger, target, result, startedAt);
    } catch (error) {
      logger.error(`Analysis cycle failed in guild ${this.guildId}`, error);
      const detail = error instanceof Error ? error.message : String(error);
      await this.notify(target, failureNotice(AnalysisFailureKind.GENERIC_FAILURE, detail));
      return { status: CycleStatus.FAILED, kind: AnalysisFailureKind.GENERIC_FAILURE, detail };
    } finally {
      await this.deps.pipeline.cleanup(cleanup);
    }
  }

  private async publish(
    trigger: CycleTrigger,
    target: PublishTarget,
    result: AnalysisOutcome,
    startedAt: Date
  ): Promise<CycleOutcome> {
    if (!result.ok) {
      logger.warn(`Analysis returned ${result.kind} in guild ${this.guildId}`, { detail: result.detail });
      await this.notify(target, failureNotice(result.kind, result.detail));
      return { status: CycleStatus.FAILED, kind: result.kind, detail: result.detail };
    }

    const report = result.report.trim();
    if (report === '') {
      await this.notify(target, failureNotice('empty_report', ''));
      return { status: CycleStatus.FAILED, kind: 'empty_report', detail: 'The analysis returned no text' };
    }

    this.context = tailCodePoints(report, CONTEXT_LIMIT);

    const timestamp = formatTimestamp(startedAt);
    const title = threadTitle(trigger, timestamp);
    const starter = await target.send(starterMessage(trigger, timestamp));
    const thread = await target.createThread(starter, title);
    for (const part of splitReport(reportHeader(trigger), report)) {
      await thread.send(part);
    }

    return { status: CycleStatus.PUBLISHED, report, threadTitle: title };
  }

  private async resolveNames(speakerIds: string[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    for (const speakerId of speakerIds) {
      try {
        names.set(speakerId, await this.deps.nameResolver.resolve(this.guildId, speakerId));
      } catch (error) {
        logger.debug(`Name lookup failed for speaker ${speakerId}`, {
          guildId: this.guildId,
          error: error instanceof Error ? error.message : String(error),
        });
        names.set(speakerId, fallbackSpeakerName(speakerId));
      }
    }
    return names;
  }

  private readSettings(): GuildSettings {
    try {
      return this.deps.settingsStore.get(this.guildId);
    } catch (error) {
      logger.warn(`Could not read settings for guild ${this.guildId}, keeping previous values`, error);
      return this.settings;
    }
  }

  private async notify(target: PublishTarget, text: string): Promise<void> {
    try {
      await target.send(text);
    } catch (error) {
      logger.warn(`Failed to post notice in guild ${this.guildId}`, error);
    }
  }
}
