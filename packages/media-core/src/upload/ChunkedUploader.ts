import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { CHUNK_PATH, FINALIZE_PATH, HLS_PATH } from '../constants.js';
import { AbortError, HttpStatusError, UploadError, ValidationError } from '../errors.js';
import type { RequestExecutor } from '../client/executor.js';
import type {
  ApiResult,
  ChunkedUploadOptions,
  ChunkedUploadResult,
  FileAttachment,
  HlsUploadOptions,
  HlsUploadResult,
  JsonObject,
  LoggerFn,
  UploadProgressEvent,
} from '../types.js';
import { formatSize } from '../utils/format.js';
import { UploadSession } from './UploadSession.js';
import type { ChunkRange } from './UploadSession.js';

const REMOTE_PATH_PATTERN = /^[A-Za-z0-9_-]{10,50}\/.+$/;
const REMOTE_DIR_PATTERN = /^[A-Za-z0-9_-]{10,50}$/;

/** One local file of an HLS upload. */
export interface HlsFile {
  name: string;
  filePath: string;
  size: number;
}

/**
 * Directory holding the fragments of playlist `m3u8Name`: the name without
 * leading or trailing dots and without its last extension.
 */
export function fragmentDirName(m3u8Name: string): string {
  const stem = m3u8Name.replace(/^\.+|\.+$/g, '');
  const dot = stem.lastIndexOf('.');
  return dot === -1 ? stem : stem.slice(0, dot);
}

/**
 * Group fragments into requests. A request closes once its size exceeds
 * `maxBytes` or it holds `maxFiles` files. The last group may be empty; the
 * playlist joins it.
 */
export function planHlsBatches(fragments: readonly HlsFile[], maxBytes: number, maxFiles: number): HlsFile[][] {
  const batches: HlsFile[][] = [];
  let current: HlsFile[] = [];
  let size = 0;
  for (const fragment of fragments) {
    current.push(fragment);
    size += fragment.size;
    if (size > maxBytes || current.length >= maxFiles) {
      batches.push(current);
      current = [];
      size = 0;
    }
  }
  batches.push(current);
  return batches;
}

async function statIfExists(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return null;
    throw err;
  }
}

/**
 * Uploads a local file in fixed-size chunks, one at a time and in offset
 * order, then finalizes the remote resource.
 *
 * A failed upload leaves whatever the server already received in place;
 * removing it is up to the caller.
 */
export class ChunkedUploader {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly logger: LoggerFn
  ) { }

  /**
   * @returns The remote identifier and the finalize response.
   * @throws {ValidationError} If `remotePath` is malformed.
   * @throws {UploadError} If the file is empty or the chunk sequence breaks.
   * @throws {TransportError} If a chunk still fails after the retry budget.
   * @throws {ApiError} If the server rejects a chunk or the finalize call.
   */
  async upload(filePath: string, opts: ChunkedUploadOptions = {}): Promise<ChunkedUploadResult> {
    const { remotePath, timeout, signal, onProgress } = opts;
    if (remotePath !== undefined && !REMOTE_PATH_PATTERN.test(remotePath)) {
      throw new ValidationError(`Invalid "remotePath" value: "${remotePath}".`);
    }

    const conf = this.executor.configuration;
    const maxRetry = this.executor.resolveMaxRetry(opts.maxRetry);
    const session = await UploadSession.open(filePath, opts.chunkSize ?? conf.UPLOAD_CHUNK_SIZE);
    const progress = this.progressReporter(onProgress);

    try {
      this.logger('info', `Uploading file "${session.fileName}" (${formatSize(session.totalSize)}, ${session.totalChunks} chunks).`);
      progress({ phase: 'prepare', text: 'Preparing upload...', percent: 0, processedBytes: 0, totalBytes: session.totalSize, chunkIndex: 0, totalChunks: session.totalChunks });

      const begin = Date.now();
      for (let range = session.nextChunk(); range; range = session.nextChunk()) {
        if (signal?.aborted) throw new AbortError('Upload aborted.', { cause: signal.reason });

        progress({
          phase: 'chunk',
          text: `Uploading chunk ${range.index + 1} of ${session.totalChunks}...`,
          percent: (range.start / session.totalSize) * 100,
          processedBytes: range.start,
          totalBytes: session.totalSize,
          chunkIndex: range.index,
          totalChunks: session.totalChunks,
        });

        const data = await session.read(range);
        const uploadId = await this.sendChunk(session, range, data, { maxRetry, timeout, signal, progress });
        session.acknowledge(range, uploadId);
      }

      const seconds = Math.max((Date.now() - begin) / 1000, 0.001);
      this.logger('info', `Upload finished, average bandwidth was ${formatSize(session.totalSize / seconds)}/s.`);

      session.transition('finalizing');
      progress({ phase: 'finalize', text: 'Finalising upload...', percent: 100, processedBytes: session.totalSize, totalBytes: session.totalSize });

      const uploadId = session.uploadId;
      if (!uploadId) throw new UploadError('Upload identifier missing before finalization.');
      const fields: JsonObject = {
        upload_id: uploadId,
        expected_size: String(session.totalSize),
        no_md5: 'yes',
      };
      if (remotePath) fields.path = remotePath;

      const response = await this.executor.call(FINALIZE_PATH, {
        method: 'POST',
        data: fields,
        maxRetry,
        ...(timeout !== undefined ? { timeout } : {}),
        ...(signal ? { signal } : {}),
      });

      session.transition('done');
      progress({ phase: 'done', text: 'Upload complete.', percent: 100, processedBytes: session.totalSize, totalBytes: session.totalSize });

      return { uploadId, totalSize: session.totalSize, chunkCount: session.totalChunks, response };
    } catch (err) {
      session.fail();
      throw err;
    } finally {
      await session.close();
    }
  }

  /**
   * Upload an HLS playlist and the fragments found in the directory named
   * after it ("video.m3u8" next to "video/"). Fragments go in name order,
   * grouped by UPLOAD_CHUNK_SIZE bytes and UPLOAD_MAX_FILES files per request;
   * the playlist travels with the last group.
   *
   * @throws {ValidationError} If the playlist or its fragment directory is
   * missing, or `remoteDir` is malformed.
   * @throws {UploadError} If the server never names the remote directory.
   */
  async hlsUpload(m3u8Path: string, opts: HlsUploadOptions = {}): Promise<HlsUploadResult> {
    const { timeout, signal, onProgress } = opts;
    let remoteDir = opts.remoteDir ?? '';
    if (remoteDir && !REMOTE_DIR_PATTERN.test(remoteDir)) {
      throw new ValidationError(`Invalid "remoteDir" value: "${remoteDir}".`);
    }

    const conf = this.executor.configuration;
    const maxRetry = this.executor.resolveMaxRetry(opts.maxRetry);

    const playlist = await statIfExists(m3u8Path);
    if (!playlist?.isFile()) {
      throw new ValidationError(`The m3u8 file "${m3u8Path}" does not exist.`);
    }
    const hlsName = fragmentDirName(path.basename(m3u8Path));
    const tsDir = path.join(path.dirname(m3u8Path), hlsName);
    if (!(await statIfExists(tsDir))?.isDirectory()) {
      throw new ValidationError(`The ts directory "${tsDir}" of the m3u8 file "${m3u8Path}" does not exist.`);
    }

    const fragments: HlsFile[] = [];
    for (const name of (await fs.readdir(tsDir)).sort()) {
      const filePath = path.join(tsDir, name);
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) {
        this.logger('warn', `Ignoring "${name}" in "${tsDir}": not a file.`);
        continue;
      }
      fragments.push({ name, filePath, size: stat.size });
    }

    const batches = planHlsBatches(fragments, conf.UPLOAD_CHUNK_SIZE, conf.UPLOAD_MAX_FILES);
    batches[batches.length - 1].push({ name: path.basename(m3u8Path), filePath: m3u8Path, size: playlist.size });
    const totalSize = fragments.reduce((sum, f) => sum + f.size, playlist.size);
    const progress = this.progressReporter(onProgress);

    this.logger('info', `Uploading HLS "${path.basename(m3u8Path)}" (${fragments.length} fragments, ${formatSize(totalSize)}).`);
    progress({ phase: 'prepare', text: 'Preparing HLS upload...', percent: 0, processedBytes: 0, totalBytes: totalSize, chunkIndex: 0, totalChunks: batches.length });

    const begin = Date.now();
    let sent = 0;
    for (const [index, batch] of batches.entries()) {
      if (signal?.aborted) throw new AbortError('Upload aborted.', { cause: signal.reason });

      const batchSize = batch.reduce((sum, f) => sum + f.size, 0);
      progress({
        phase: 'chunk',
        text: `Uploading request ${index + 1} of ${batches.length}...`,
        percent: totalSize > 0 ? (sent / totalSize) * 100 : 0,
        processedBytes: sent,
        totalBytes: totalSize,
        chunkIndex: index,
        totalChunks: batches.length,
      });
      this.logger('info', `Uploading ${batch.length} files (${formatSize(batchSize)}) of "${hlsName}" in one request.`);

      const data: JsonObject = { dir_name: remoteDir, hls_name: hlsName };
      const files: Record<string, FileAttachment> = {};
      for (const file of batch) {
        data[file.name] = String(file.size);
        files[file.name] = { filename: file.name, content: await fs.readFile(file.filePath) };
      }

      const response = await this.executor.call(HLS_PATH, {
        method: 'POST',
        data,
        files,
        maxRetry,
        ...(timeout !== undefined ? { timeout } : {}),
        ...(signal ? { signal } : {}),
      });
      if (!remoteDir && typeof response.dir_name === 'string') remoteDir = response.dir_name;
      sent += batchSize;
    }

    if (!remoteDir) {
      throw new UploadError('The server did not return the name of the HLS directory.');
    }
    const seconds = Math.max((Date.now() - begin) / 1000, 0.001);
    this.logger('info', `HLS upload finished (${fragments.length + 1} files in "${remoteDir}"), average bandwidth was ${formatSize(totalSize / seconds)}/s.`);
    progress({ phase: 'done', text: 'Upload complete.', percent: 100, processedBytes: totalSize, totalBytes: totalSize });

    return { remoteDir, fileCount: fragments.length + 1, totalSize, requestCount: batches.length };
  }

  private progressReporter(onProgress: ((evt: UploadProgressEvent) => void) | undefined): (evt: UploadProgressEvent) => void {
    return (evt) => {
      try {
        onProgress?.(evt);
      } catch (err) {
        this.logger('warn', 'Upload progress callback threw.', err);
      }
    };
  }

  /**
   * Send one chunk, re-sending it on transient failures. Returns the upload
   * identifier reported by the server, if any.
   */
  private async sendChunk(
    session: UploadSession,
    range: ChunkRange,
    content: Uint8Array,
    opts: {
      maxRetry: number;
      timeout: number | undefined;
      signal: AbortSignal | undefined;
      progress: (evt: UploadProgressEvent) => void;
    }
  ): Promise<string | undefined> {
    const uploadId = session.uploadId;
    const request = this.executor.buildRequest(CHUNK_PATH, {
      method: 'POST',
      headers: { 'Content-Range': `bytes ${range.start}-${range.end - 1}/${session.totalSize}` },
      data: uploadId ? { upload_id: uploadId } : {},
      files: { file: { filename: session.fileName, content } },
      ...(opts.timeout !== undefined ? { timeout: opts.timeout } : {}),
      ...(opts.signal ? { signal: opts.signal } : {}),
    });
    const label = `Chunk ${range.index + 1}/${session.totalChunks} upload`;
    this.logger('debug', `Uploading chunk ${range.index + 1}/${session.totalChunks}.`);

    const result = await this.executor.retry<ApiResult | null>(() => this.executor.execute(request), {
      label,
      maxRetry: opts.maxRetry,
      ...(opts.signal ? { signal: opts.signal } : {}),
      recover: (err, tried) => {
        // A re-sent chunk the server already stored is answered with a 400
        // whose offset points just past it.
        if (!(err instanceof HttpStatusError) || err.status !== 400) return undefined;
        if (tried > 1 && uploadId && Number(err.payload?.offset) === range.end) {
          this.logger('info', `Offset issue detected during upload, ignoring error: ${err.message}`);
          return { value: null };
        }
        return undefined;
      },
      onRetry: (_err, tried, delayMs) => {
        opts.progress({
          phase: 'retry-wait',
          text: `Chunk upload failed. Retrying in ${(delayMs / 1000).toFixed(1)}s... (${tried}/${opts.maxRetry})`,
          percent: (range.start / session.totalSize) * 100,
          processedBytes: range.start,
          totalBytes: session.totalSize,
          chunkIndex: range.index,
          totalChunks: session.totalChunks,
        });
      },
    });

    if (result === null) return uploadId ?? undefined;
    const returned = result.upload_id;
    if (typeof returned === 'string' && returned) return returned;
    if (uploadId) return uploadId;
    throw new UploadError(`The server did not return an upload identifier for chunk ${range.index + 1}.`, {
      details: result,
    });
  }
}
