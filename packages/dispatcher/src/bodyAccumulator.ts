export class BodyAccumulatorReleasedError extends Error {
  public constructor() {
    super('Body accumulator was released');
    this.name = 'BodyAccumulatorReleasedError';
  }
}

/** Body bytes received so far for one request. */
export class BodyAccumulator {
  private chunks: Buffer[] = [];
  private totalBytes = 0;
  private isReleased = false;

  public append(chunk: Uint8Array) {
    if (this.isReleased) {
      throw new BodyAccumulatorReleasedError();
    }

    if (chunk.byteLength === 0) {
      return;
    }

    this.chunks.push(Buffer.from(chunk));
    this.totalBytes += chunk.byteLength;
  }

  public get byteLength() {
    return this.totalBytes;
  }

  public get chunkCount() {
    return this.chunks.length;
  }

  public get released() {
    return this.isReleased;
  }

  public toBuffer() {
    if (this.isReleased) {
      throw new BodyAccumulatorReleasedError();
    }

    return Buffer.concat(this.chunks, this.totalBytes);
  }

  public release() {
    this.chunks = [];
    this.totalBytes = 0;
    this.isReleased = true;
  }
}
