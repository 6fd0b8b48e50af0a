import axios, { AxiosResponse } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import FormData from 'form-data';
import { AnalysisFailureKind, AnalysisOutcome, AnalysisRequest, Analyzer } from '../models/types';
import { delay } from '../utils/async';
import { mimeTypeFor } from '../utils/audio';
import { logger } from '../utils/logger';
import { observabilityService } from './observability';
import { formatContext, formatSpeakerLabel, getPrompt } from './prompts';

interface GeminiFile {
  name: string; // "files/<id>"
  uri: string;
  mimeType: string;
  state: string;
}

interface UploadResponse {
  file: GeminiFile;
}

interface GenerateResponse {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
  error?: { code: number; message: string };
}

type ContentPart = { text: string } | { file_data: { file_uri: string; mime_type: string } };

export interface GeminiAnalyzerOptions {
  baseUrl: string;
  uploadUrl: string;
  model: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getHttpStatus(error: unknown): number | undefined {
  const response = isRecord(error) ? error.response : undefined;
  if (!isRecord(response)) return undefined;
  const status = response.status;
  return typeof status === 'number' ? status : undefined;
}

function describeError(error: unknown): string {
  const response = isRecord(error) ? error.response : undefined;
  const data = isRecord(response) ? response.data : undefined;
  const apiError = isRecord(data) ? data.error : undefined;
  const apiMessage = isRecord(apiError) ? apiError.message : undefined;
  const status = getHttpStatus(error);

  if (typeof apiMessage === 'string') {
    return status ? `HTTP ${status}: ${apiMessage}` : apiMessage;
  }
  return error instanceof Error ? error.message : String(error);
}

function isRateLimited(error: unknown): boolean {
  return getHttpStatus(error) === 429 || /quota/i.test(describeError(error));
}

function isRetryable(error: unknown): boolean {
  const status = getHttpStatus(error);
  return status === undefined || status === 408 || status >= 500;
}

export class GeminiAnalyzer implements Analyzer {
  private baseUrl: string;
  private uploadUrl: string;
  private model: string;
  private maxRetries: number;
  private retryBaseDelayMs: number;
  private pollIntervalMs: number;
  private maxPollAttempts: number;

  constructor(options: GeminiAnalyzerOptions) {
    this.baseUrl = options.baseUrl;
    this.uploadUrl = options.uploadUrl;
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxPollAttempts = options.maxPollAttempts ?? 30;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const credential = request.credential;
    if (!credential) {
      return { ok: false, kind: AnalysisFailureKind.NO_CREDENTIAL, detail: 'No Gemini API key is configured' };
    }

    return observabilityService.executeWithSpan(
      'gemini.analyze',
      async (): Promise<AnalysisOutcome> => {
        const uploaded: GeminiFile[] = [];

        try {
          const speakerParts: ContentPart[] = [];
          let lastUploadError: string | undefined;

          for (const [speakerId, filePath] of request.artifacts) {
            const speakerName = request.speakerNames.get(speakerId) ?? `User_${speakerId}`;
            try {
              const file = await this.uploadFile(filePath, credential);
              uploaded.push(file);
              await this.waitForActive(file, credential);

              speakerParts.push(
                { text: formatSpeakerLabel(speakerName) },
                { file_data: { file_uri: file.uri, mime_type: file.mimeType } }
              );
            } catch (error) {
              if (isRateLimited(error)) throw error;
              lastUploadError = describeError(error);
              logger.warn(`Skipping audio for ${speakerName}: upload failed`, { speakerId, error: lastUploadError });
            }
          }

          if (speakerParts.length === 0) {
            return {
              ok: false,
              kind: AnalysisFailureKind.UPLOAD_FAILED,
              detail: lastUploadError ?? 'No audio files could be uploaded',
            };
          }

          const parts: ContentPart[] = [{ text: getPrompt(request.mode) }];
          if (request.context) {
            parts.push({ text: formatContext(request.context) });
          }
          parts.push(...speakerParts);

          const report = await this.generate(parts, credential);
          return { ok: true, report };
        } catch (error) {
          if (isRateLimited(error)) {
            logger.warn('Gemini rate limit reached', { error: describeError(error) });
            return { ok: false, kind: AnalysisFailureKind.RATE_LIMITED, detail: describeError(error) };
          }
          logger.error('Gemini analysis failed', { error: describeError(error) });
          return { ok: false, kind: AnalysisFailureKind.GENERIC_FAILURE, detail: describeError(error) };
        } finally {
          await this.deleteFiles(uploaded, credential);
        }
      },
      { fileCount: request.artifacts.size, mode: request.mode, model: this.model },
      outcome => (outcome.ok ? { 'analysis.ok': true } : { 'analysis.ok': false, 'analysis.failure': outcome.kind })
    );
  }

  private async uploadFile(filePath: string, credential: string): Promise<GeminiFile> {
    return observabilityService.executeWithSpan(
      'gemini.upload_file',
      async () => {
        const content = await fs.promises.readFile(filePath);
        const fileName = path.basename(filePath);
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
          const formData = new FormData();
          formData.append('metadata', JSON.stringify({ file: { display_name: fileName } }), {
            contentType: 'application/json',
          });
          formData.append('file', content, { filename: fileName, contentType: mimeTypeFor(filePath) });

          try {
            const response: AxiosResponse<UploadResponse> = await axios.post(
              `${this.uploadUrl}/files`,
              formData,
              {
                headers: {
                  ...formData.getHeaders(),
                  'x-goog-api-key': credential,
                  'X-Goog-Upload-Protocol': 'multipart',
                },
                timeout: 60000,
              }
            );

            logger.info(`Uploaded ${fileName}`, { file: response.data.file.name, attempt });
            return response.data.file;
          } catch (error) {
            lastError = error;
            if (!isRetryable(error)) throw error;

            logger.warn(`Upload attempt ${attempt} failed for ${fileName}`, { error: describeError(error) });
            if (attempt < this.maxRetries) {
              await delay(Math.pow(2, attempt - 1) * this.retryBaseDelayMs);
            }
          }
        }

        throw lastError;
      },
      { fileName: path.basename(filePath) }
    );
  }

  private async waitForActive(file: GeminiFile, credential: string): Promise<void> {
    if (file.state === 'ACTIVE') return;

    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      const response: AxiosResponse<GeminiFile> = await axios.get(`${this.baseUrl}/${file.name}`, {
        headers: { 'x-goog-api-key': credential },
        timeout: 10000,
      });

      if (response.data.state === 'ACTIVE') return;
      if (response.data.state === 'FAILED') {
        throw new Error(`File ${file.name} failed to process`);
      }

      logger.debug(`Waiting for ${file.name} to become active`, { state: response.data.state, attempt });
      if (attempt < this.maxPollAttempts) {
        await delay(this.pollIntervalMs);
      }
    }

    throw new Error(`File ${file.name} was not processed after ${this.maxPollAttempts} checks`);
  }

  private async generate(parts: ContentPart[], credential: string): Promise<string> {
    return observabilityService.executeWithSpan(
      'gemini.generate_content',
      async () => {
        const response: AxiosResponse<GenerateResponse> = await axios.post(
          `${this.baseUrl}/models/${this.model}:generateContent`,
          {
            contents: [{ role: 'user', parts }],
            tools: [{ google_search: {} }],
          },
          {
            headers: { 'x-goog-api-key': credential, 'Content-Type': 'application/json' },
            timeout: 300000,
          }
        );

        if (response.data.error) {
          throw new Error(response.data.error.message);
        }

        const candidateParts = response.data.candidates?.[0]?.content?.parts ?? [];
        return candidateParts.map(part => part.text ?? '').join('');
      },
      { partCount: parts.length }
    );
  }

  private async deleteFiles(files: GeminiFile[], credential: string): Promise<void> {
    for (const file of files) {
      try {
        await axios.delete(`${this.baseUrl}/${file.name}`, {
          headers: { 'x-goog-api-key': credential },
          timeout: 10000,
        });
      } catch (error) {
        logger.warn(`Failed to delete uploaded file ${file.name}`, { error: describeError(error) });
      }
    }
  }
}
