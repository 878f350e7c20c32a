/** Anything that accepts byte chunks and reports completion, e.g. `process.stdout`. */
export interface MirrorWriter {
  write(chunk: Uint8Array, callback: (err?: Error | null) => void): boolean;
}

/** Text or byte sink for headers, summaries and mirrored output. */
export interface OutputStream {
  write(chunk: string | Uint8Array, callback?: (err?: Error | null) => void): boolean;
}

/** Write and wait until the chunk has been handed to the underlying resource. */
export function writeOutput(out: OutputStream, chunk: string | Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    out.write(chunk, (err) => (err ? reject(err) : resolve()));
  });
}

function writeChunk(writer: MirrorWriter, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    writer.write(chunk, (err) => (err ? reject(err) : resolve()));
  });
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toBytes(chunk: Uint8Array | string): Uint8Array {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
}

/**
 * Wraps a byte source and forwards every chunk to a mirror as it is read.
 * A chunk is yielded only after the mirror has accepted it, so consumers see
 * exactly the bytes the mirror saw, in the same order.
 *
 * A failed mirror write is kept in `mirrorError` and ends mirroring; reading
 * carries on, so the source is still drained and captured.
 */
export class TeeReader<R extends AsyncIterable<Uint8Array | string>, W extends MirrorWriter>
  implements AsyncIterable<Uint8Array>
{
  mirrorError: Error | null = null;

  constructor(
    private readonly source: R,
    private readonly mirror: W | null,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for await (const raw of this.source) {
      const chunk = toBytes(raw);
      if (this.mirror && !this.mirrorError) {
        try {
          await writeChunk(this.mirror, chunk);
        } catch (err) {
          this.mirrorError = toError(err);
        }
      }
      yield chunk;
    }
  }
}

export interface Capture {
  bytes: Buffer;
  /** Set when reading the source failed part-way; `bytes` holds what arrived before. */
  error: Error | null;
  /** Set when writing to the mirror failed; reading went on regardless. */
  mirrorError: Error | null;
}

/** Drain a tee into memory, keeping partial output on read failure. */
export async function capture(
  reader: AsyncIterable<Uint8Array> & { readonly mirrorError?: Error | null },
): Promise<Capture> {
  const chunks: Uint8Array[] = [];
  let error: Error | null = null;
  try {
    for await (const chunk of reader) chunks.push(chunk);
  } catch (err) {
    error = toError(err);
  }
  return { bytes: Buffer.concat(chunks), error, mirrorError: reader.mirrorError ?? null };
}
