import fs from 'node:fs';
import path from 'node:path';
import { formatSize } from '@media-api/core';
import type { JsonObject, MediaServerClient, UploadProgressEvent } from '@media-api/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag, getFlagArray, parseKeyValues } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { ProgressRenderer } from '../lib/progress.js';
import { countOf, formatDuration } from '../lib/format.js';
import {
  boldCyan,
  dim,
  outputMode,
  printBlank,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
} from '../lib/output.js';
import type { OutputMode } from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

interface Outcome {
  /** Printed alone under --quiet. */
  id: string;
  label: string;
  json: object;
}

type Transfer = (
  client: MediaServerClient,
  onProgress: (evt: UploadProgressEvent) => void,
  signal: AbortSignal
) => Promise<Outcome>;

export async function run(_args: string[], flags: ParsedFlags): Promise<void> {
  const filePaths = getFlagArray(flags, 'i', 'input');
  if (filePaths.length === 0) {
    exitUsage('A file is required. Use -i <file>.');
  }
  if (filePaths.length > 1) {
    exitUsage('Only one file can be uploaded at a time.');
  }
  const filePath = filePaths[0];

  if (!fs.existsSync(filePath)) {
    exitUsage(`File not found: ${filePath}`);
  }
  const stat = fs.statSync(filePath);
  if (!stat.isFile()) {
    exitUsage(`Not a file: ${filePath}`);
  }

  const title = getFlag(flags, 'title', 't');
  const channel = getFlag(flags, 'channel', 'c');
  const remotePath = getFlag(flags, 'remote-path');
  const remoteDir = getFlag(flags, 'remote-dir');
  const isPlaylist = path.extname(filePath).toLowerCase() === '.m3u8';
  const metadata: JsonObject = parseKeyValues(getFlagArray(flags, 'field'));
  if (channel) metadata.channel = channel;

  const mode = outputMode(flags);
  const client = await createClient(flags);
  const conf = client.config;
  const fileName = path.basename(filePath);

  let transfer: Transfer;
  let heading: string;
  if (isPlaylist) {
    heading = 'HLS Upload';
    transfer = async (c, onProgress, signal) => {
      const result = await c.hlsUpload(filePath, { onProgress, signal, ...(remoteDir ? { remoteDir } : {}) });
      return { id: result.remoteDir, label: 'Remote directory:', json: result };
    };
  } else if (remotePath) {
    heading = 'File Upload';
    transfer = async (c, onProgress, signal) => {
      const result = await c.chunkedUpload(filePath, { remotePath, onProgress, signal });
      return { id: result.uploadId, label: 'Upload ID:', json: result };
    };
  } else {
    heading = 'Media Upload';
    transfer = async (c, onProgress, signal) => {
      const response = await c.addMedia({ filePath, metadata, onProgress, signal, ...(title ? { title } : {}) });
      return { id: typeof response.oid === 'string' ? response.oid : '', label: 'Media OID:', json: response };
    };
  }

  if (mode === 'human') {
    const chunks = Math.ceil(stat.size / conf.UPLOAD_CHUNK_SIZE);
    printHeader(heading);
    printKeyValue('Server', conf.SERVER_URL);
    printKeyValue('File', `${fileName} ${dim(`(${formatSize(stat.size)}${isPlaylist ? '' : `, ${countOf(chunks, 'chunk')}`})`)}`);
    if (remotePath && !isPlaylist) printKeyValue('Destination', remotePath);
    if (remoteDir && isPlaylist) printKeyValue('Destination', remoteDir);
    if (title && !isPlaylist && !remotePath) printKeyValue('Title', title);
    if (channel && !isPlaylist && !remotePath) printKeyValue('Channel', channel);
    printBlank();
  }

  const progress = new ProgressRenderer(fileName);
  const abortController = new AbortController();

  // First Ctrl+C cancels the upload, the second exits.
  let interrupts = 0;
  const onInterrupt = (): void => {
    interrupts++;
    if (interrupts === 1) abortController.abort();
    else process.exit(130);
  };
  process.on('SIGINT', onInterrupt);

  const begin = Date.now();
  try {
    const outcome = await transfer(
      client,
      (evt) => {
        if (mode === 'human') progress.update(evt);
      },
      abortController.signal
    );
    progress.finish();
    report(mode, outcome, Date.now() - begin);
  } finally {
    progress.finish();
    process.removeListener('SIGINT', onInterrupt);
    await client.close();
  }
}

function report(mode: OutputMode, outcome: Outcome, elapsedMs: number): void {
  if (mode === 'json') {
    printJson({ ...outcome.json, elapsed: elapsedMs });
    return;
  }
  if (mode === 'quiet') {
    console.log(outcome.id);
    return;
  }

  printBlank();
  printSuccess(`Upload complete! ${dim(`(${formatDuration(elapsedMs)})`)}`);
  printBlank();
  if (outcome.id) console.log(`  ${dim(outcome.label)} ${boldCyan(outcome.id)}`);
  printBlank();
}
