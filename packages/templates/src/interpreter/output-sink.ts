/**
 * Destination for rendered text
 */
export interface OutputSink {
  write(chunk: string): void;
}

/**
 * Sink that accumulates everything written into one string
 */
export class StringSink implements OutputSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
    }
  }

  toString(): string {
    return this.chunks.join('');
  }
}
