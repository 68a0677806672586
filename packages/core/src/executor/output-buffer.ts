/**
 * Byte-bounded output collector. Bytes past the limit are dropped and the
 * marker is appended once when the text is read.
 */
export class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(
    private readonly limit: number,
    private readonly marker: string
  ) {}

  push(chunk: Buffer): void {
    if (this.truncated) {
      return;
    }

    const remaining = this.limit - this.size;
    if (chunk.length > remaining) {
      this.chunks.push(chunk.subarray(0, remaining));
      this.size = this.limit;
      this.truncated = true;
      return;
    }

    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get isTruncated(): boolean {
    return this.truncated;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? `${text}${this.marker}` : text;
  }
}
