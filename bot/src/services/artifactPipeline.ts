import * as fs from 'fs';
import * as path from 'path';
import { ArtifactConverter, ConvertedArtifacts } from '../models/types';
import { estimateDurationSeconds } from '../utils/audio';
import { logger } from '../utils/logger';
import { observabilityService } from './observability';

/**
 * Turns a flushed speaker -> PCM map into analyzable files.
 *
 * Every path written here (raw and converted, including those of speakers
 * whose conversion failed) is returned in `cleanup`; the caller must pass it
 * to {@link ArtifactPipeline.cleanup} on every exit path.
 */
export class ArtifactPipeline {
  private tempDir: string;
  private converter: ArtifactConverter;

  constructor(tempDir: string, converter: ArtifactConverter) {
    this.tempDir = tempDir;
    this.converter = converter;
  }

  async convert(raw: Map<string, Buffer>, filePrefix: string): Promise<ConvertedArtifacts> {
    const artifacts = new Map<string, string>();
    const cleanup: string[] = [];

    await observabilityService.executeWithSpan(
      'artifact_pipeline.convert',
      async () => {
        await fs.promises.mkdir(this.tempDir, { recursive: true });

        for (const [speakerId, pcm] of raw) {
          const rawPath = path.join(this.tempDir, `${filePrefix}_${speakerId}.pcm`);
          const artifactPath = path.join(this.tempDir, `${filePrefix}_${speakerId}.${this.converter.extension}`);
          cleanup.push(rawPath, artifactPath);

          try {
            await fs.promises.writeFile(rawPath, pcm);
            const converted = await this.converter.convert(rawPath);
            if (converted !== artifactPath) cleanup.push(converted);
            artifacts.set(speakerId, converted);

            logger.debug(`Converted audio for speaker ${speakerId}`, {
              bytes: pcm.length,
              seconds: Math.round(estimateDurationSeconds(pcm.length)),
            });
          } catch (error) {
            logger.warn(`Audio conversion failed for speaker ${speakerId}, dropping from this cycle`, error);
          }
        }
      },
      { speakerCount: raw.size, format: this.converter.extension }
    );

    return { artifacts, cleanup };
  }

  async cleanup(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await fs.promises.rm(filePath, { force: true });
      } catch (error) {
        logger.warn(`Failed to remove temporary file ${filePath}`, error);
      }
    }
  }
}
