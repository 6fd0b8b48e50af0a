import * as fs from 'fs';
import { pipeline } from 'stream/promises';
import { FFmpeg } from 'prism-media';
import { ArtifactConverter, AudioFormat } from '../models/types';
import { createWavHeader, PCM_CHANNELS, PCM_SAMPLE_RATE, replaceExtension } from '../utils/audio';

export class WavArtifactConverter implements ArtifactConverter {
  readonly extension = 'wav';

  async convert(rawPath: string): Promise<string> {
    const pcm = await fs.promises.readFile(rawPath);
    const outputPath = replaceExtension(rawPath, this.extension);
    await fs.promises.writeFile(outputPath, Buffer.concat([createWavHeader(pcm.length), pcm]));
    return outputPath;
  }
}

// Needs ffmpeg on PATH
export class FfmpegArtifactConverter implements ArtifactConverter {
  readonly extension = 'mp3';

  async convert(rawPath: string): Promise<string> {
    const outputPath = replaceExtension(rawPath, this.extension);
    const transcoder = new FFmpeg({
      args: [
        '-analyzeduration', '0',
        '-loglevel', '0',
        '-f', 's16le',
        '-ar', String(PCM_SAMPLE_RATE),
        '-ac', String(PCM_CHANNELS),
        '-i', '-',
        '-f', 'mp3',
        '-b:a', '64k',
      ],
    });

    await pipeline(fs.createReadStream(rawPath), transcoder, fs.createWriteStream(outputPath));
    return outputPath;
  }
}

export function createArtifactConverter(format: AudioFormat): ArtifactConverter {
  return format === 'mp3' ? new FfmpegArtifactConverter() : new WavArtifactConverter();
}
