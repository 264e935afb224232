import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { UploadError } from '../errors.js';
import type { UploadState } from '../types.js';

/** Byte range of one chunk; `end` is exclusive. */
export interface ChunkRange {
  index: number;
  start: number;
  end: number;
}

const TRANSITIONS: Record<UploadState, readonly UploadState[]> = {
  preparing: ['uploading', 'failed'],
  uploading: ['finalizing', 'failed'],
  finalizing: ['done', 'failed'],
  done: [],
  failed: [],
};

/**
 * One in-progress chunked upload: the open source file, the cursor over its
 * chunks and the remote identifier once the server assigned one.
 */
export class UploadSession {
  readonly filePath: string;
  readonly fileName: string;
  readonly totalSize: number;
  readonly chunkSize: number;

  private _state: UploadState = 'preparing';
  private _chunkIndex = 0;
  private _uploadId: string | null = null;
  private handle: FileHandle | null;

  private constructor(filePath: string, handle: FileHandle, totalSize: number, chunkSize: number) {
    this.filePath = filePath;
    this.fileName = path.basename(filePath);
    this.handle = handle;
    this.totalSize = totalSize;
    this.chunkSize = chunkSize;
  }

  /**
   * Open `filePath` for reading.
   * @throws {UploadError} If the file cannot be opened, is not a regular file
   * or is empty.
   */
  static async open(filePath: string, chunkSize: number): Promise<UploadSession> {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new UploadError(`Invalid chunk size: ${chunkSize}.`);
    }
    const resolved = path.resolve(filePath);
    let handle: FileHandle;
    try {
      handle = await fs.open(resolved, 'r');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UploadError(`Cannot open file "${resolved}": ${reason}`, { cause: err });
    }
    try {
      const stat = await handle.stat();
      if (!stat.isFile()) throw new UploadError(`Not a file: ${resolved}`);
      if (stat.size === 0) throw new UploadError(`File is empty: ${resolved}`);
      return new UploadSession(resolved, handle, stat.size, chunkSize);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  get state(): UploadState {
    return this._state;
  }

  get uploadId(): string | null {
    return this._uploadId;
  }

  /** Index of the next chunk to send. */
  get chunkIndex(): number {
    return this._chunkIndex;
  }

  get totalChunks(): number {
    return Math.ceil(this.totalSize / this.chunkSize);
  }

  /** Bytes acknowledged by the server. */
  get offset(): number {
    return Math.min(this._chunkIndex * this.chunkSize, this.totalSize);
  }

  get complete(): boolean {
    return this._state === 'done';
  }

  /** The next range to send, or null once every chunk is acknowledged. */
  nextChunk(): ChunkRange | null {
    if (this._chunkIndex >= this.totalChunks) return null;
    const start = this._chunkIndex * this.chunkSize;
    return { index: this._chunkIndex, start, end: Math.min(start + this.chunkSize, this.totalSize) };
  }

  async read(range: ChunkRange): Promise<Uint8Array> {
    if (!this.handle) throw new UploadError('Upload session is closed.');
    const length = range.end - range.start;
    const buffer = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const { bytesRead } = await this.handle.read(buffer, filled, length - filled, range.start + filled);
      if (bytesRead === 0) {
        throw new UploadError(`File "${this.fileName}" shrank during upload (read ${range.start + filled} of ${this.totalSize} bytes).`);
      }
      filled += bytesRead;
    }
    return buffer;
  }

  /**
   * Record that the server accepted `range`. The first acknowledgement must
   * carry the remote identifier.
   */
  acknowledge(range: ChunkRange, uploadId?: string): void {
    if (range.index !== this._chunkIndex) {
      throw new UploadError(`Chunk ${range.index + 1} acknowledged out of order (expected ${this._chunkIndex + 1}).`);
    }
    if (this._state === 'preparing') {
      if (!uploadId) {
        throw new UploadError('The server did not return an upload identifier for the first chunk.');
      }
      this.transition('uploading');
      this._uploadId = uploadId;
    }
    this._chunkIndex++;
  }

  transition(next: UploadState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new UploadError(`Invalid upload state transition: ${this._state} -> ${next}.`);
    }
    this._state = next;
  }

  /** Move to `failed` unless already terminal. */
  fail(): void {
    if (this._state !== 'done' && this._state !== 'failed') this._state = 'failed';
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
