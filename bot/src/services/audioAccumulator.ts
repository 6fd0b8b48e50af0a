// flush swaps the map out first, so chunks appended meanwhile go to the next cycle
export class AudioAccumulator {
  private buffers = new Map<string, Buffer[]>(); // speakerId -> chunks in arrival order

  append(speakerId: string, chunk: Buffer): void {
    if (chunk.length === 0) return;

    const chunks = this.buffers.get(speakerId);
    if (chunks) {
      chunks.push(chunk);
    } else {
      this.buffers.set(speakerId, [chunk]);
    }
  }

  flush(): Map<string, Buffer> {
    const drained = this.buffers;
    this.buffers = new Map();

    const result = new Map<string, Buffer>();
    for (const [speakerId, chunks] of drained) {
      const audio = Buffer.concat(chunks);
      if (audio.length > 0) {
        result.set(speakerId, audio);
      }
    }
    return result;
  }

  bufferedBytes(): number {
    let total = 0;
    for (const chunks of this.buffers.values()) {
      for (const chunk of chunks) total += chunk.length;
    }
    return total;
  }

  speakerCount(): number {
    return this.buffers.size;
  }
}
