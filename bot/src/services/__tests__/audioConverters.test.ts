import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FFmpeg } from 'prism-media';
import { createArtifactConverter, FfmpegArtifactConverter, WavArtifactConverter } from '../audioConverters';

jest.mock('prism-media', () => {
  const { PassThrough: MockPassThrough } = jest.requireActual<typeof import('stream')>('stream');
  return { FFmpeg: jest.fn(() => new MockPassThrough()) };
});

describe('audioConverters', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'audio-converters-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('WavArtifactConverter', () => {
    it('should prepend a 44 byte RIFF header describing 48kHz stereo PCM', async () => {
      // Arrange
      const rawPath = path.join(tempDir, 'speaker.pcm');
      const pcm = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8]);
      fs.writeFileSync(rawPath, pcm);

      // Act
      const outputPath = await new WavArtifactConverter().convert(rawPath);

      // Assert
      const wav = fs.readFileSync(outputPath);
      expect(outputPath).toBe(path.join(tempDir, 'speaker.wav'));
      expect(wav.length).toBe(52);
      expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
      expect(wav.readUInt32LE(4)).toBe(44);
      expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
      expect(wav.readUInt16LE(22)).toBe(2);
      expect(wav.readUInt32LE(24)).toBe(48000);
      expect(wav.readUInt32LE(28)).toBe(192000);
      expect(wav.readUInt16LE(34)).toBe(16);
      expect(wav.toString('ascii', 36, 40)).toBe('data');
      expect(wav.readUInt32LE(40)).toBe(8);
      expect([...wav.subarray(44)]).toEqual([...pcm]);
    });

    it('should fail when the raw file is missing', async () => {
      await expect(new WavArtifactConverter().convert(path.join(tempDir, 'missing.pcm'))).rejects.toThrow();
    });
  });

  describe('FfmpegArtifactConverter', () => {
    it('should pipe the raw file through ffmpeg into an mp3 beside it', async () => {
      const rawPath = path.join(tempDir, 'speaker.pcm');
      fs.writeFileSync(rawPath, Buffer.from('pcm-bytes'));

      const outputPath = await new FfmpegArtifactConverter().convert(rawPath);

      expect(outputPath).toBe(path.join(tempDir, 'speaker.mp3'));
      // the mocked transcoder passes bytes through unchanged
      expect(fs.readFileSync(outputPath, 'utf8')).toBe('pcm-bytes');
      const { args } = jest.mocked(FFmpeg).mock.calls[0][0] ?? { args: [] };
      expect(args).toEqual(expect.arrayContaining(['-f', 's16le', '-ar', '48000', '-ac', '2', '-b:a', '64k']));
    });
  });

  it('should pick the converter from the configured format', () => {
    expect(createArtifactConverter('wav').extension).toBe('wav');
    expect(createArtifactConverter('mp3').extension).toBe('mp3');
  });
});
