import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { HubError } from '../errors';

export const STREAM_CHUNK_BYTES = 64 * 1024;

export type OpenFile = (filePath: string) => Promise<FileHandle>;

export const openForReading: OpenFile = (filePath) => fs.open(filePath, 'r');

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Streams `length` bytes of an open file starting at `start`, one chunk per pull.
 * The stream owns the handle and closes it on end, error or destroy, including a destroy
 * before the first read. A file shorter than the window errors the stream instead of
 * ending it early.
 */
class ByteWindowReadable extends Readable {
  private position: number;
  private remaining: number;

  constructor(
    private readonly handle: FileHandle,
    start: number,
    length: number,
    private readonly chunkBytes: number
  ) {
    super({ highWaterMark: chunkBytes });
    this.position = start;
    this.remaining = length;
  }

  _read(): void {
    if (this.remaining <= 0) {
      this.push(null);
      return;
    }
    const buffer = Buffer.alloc(Math.min(this.chunkBytes, this.remaining));
    this.handle.read(buffer, 0, buffer.length, this.position).then(
      ({ bytesRead }) => {
        if (bytesRead === 0) {
          this.destroy(
            new HubError('File ended before the requested bytes were read', 'IO_ERROR', {
              position: this.position,
              remaining: this.remaining
            })
          );
          return;
        }
        this.position += bytesRead;
        this.remaining -= bytesRead;
        this.push(bytesRead === buffer.length ? buffer : buffer.subarray(0, bytesRead));
      },
      (err: unknown) => {
        this.destroy(toError(err));
      }
    );
  }

  _destroy(err: Error | null, callback: (error?: Error | null) => void): void {
    this.handle.close().then(
      () => callback(err),
      (closeErr: unknown) => callback(err ?? toError(closeErr))
    );
  }
}

export function createByteWindowStream(
  handle: FileHandle,
  start: number,
  length: number,
  chunkBytes: number = STREAM_CHUNK_BYTES
): Readable {
  return new ByteWindowReadable(handle, start, length, chunkBytes);
}
