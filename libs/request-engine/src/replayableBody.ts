import type { RawBodySource } from './types';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const toBytes = (chunk: Uint8Array | string): Uint8Array =>
  typeof chunk === 'string' ? encoder.encode(chunk) : chunk;

/**
 * Request payload captured once at build time and handed out as a fresh copy on
 * every send attempt, so retries re-transmit identical bytes even when the original
 * source was a single-use stream.
 */
export class ReplayableBody {
  private attemptCount = 0;

  private constructor(private readonly bytes: Uint8Array | undefined) {}

  static empty(): ReplayableBody {
    return new ReplayableBody(undefined);
  }

  static fromBytes(bytes: Uint8Array): ReplayableBody {
    return new ReplayableBody(bytes.slice());
  }

  /**
   * Drains the source exactly once into an owned buffer.
   */
  static async capture(source: RawBodySource): Promise<ReplayableBody> {
    if (typeof source === 'string' || source instanceof Uint8Array) {
      return ReplayableBody.fromBytes(toBytes(source));
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    for await (const chunk of source) {
      const bytes = toBytes(chunk);
      chunks.push(bytes);
      total += bytes.byteLength;
    }

    const buffer = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      buffer.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return new ReplayableBody(buffer);
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get isEmpty(): boolean {
    return this.bytes === undefined;
  }

  get length(): number {
    return this.bytes?.byteLength ?? 0;
  }

  /**
   * Starts a new attempt and returns a copy of the payload the transport may consume.
   */
  rearm(): Uint8Array | undefined {
    this.attemptCount += 1;
    return this.bytes?.slice();
  }

  text(): string {
    return this.bytes ? decoder.decode(this.bytes) : '';
  }
}
