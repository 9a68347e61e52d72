/**
 * Append Buffer
 *
 * Accumulates one frame of output so it reaches the terminal in a single
 * write.
 */

export class AppendBuffer {
  private chunks: string[] = [];
  private size = 0;

  append(data: string): this {
    this.chunks.push(data);
    this.size += data.length;
    return this;
  }

  get length(): number {
    return this.size;
  }

  clear(): void {
    this.chunks = [];
    this.size = 0;
  }

  toString(): string {
    return this.chunks.join('');
  }
}
