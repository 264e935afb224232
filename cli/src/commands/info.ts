import { formatSize } from '@media-api/core';
import type { ParsedFlags } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { formatDuration } from '../lib/format.js';
import { dim, outputMode, printBlank, printHeader, printJson, printKeyValue } from '../lib/output.js';

export async function run(_args: string[], flags: ParsedFlags): Promise<void> {
  const client = await createClient(flags);
  try {
    const conf = client.config;
    const begin = Date.now();
    const version = await client.getServerVersion();
    const elapsed = Date.now() - begin;

    if (outputMode(flags) === 'json') {
      printJson({
        server: conf.SERVER_URL,
        version: version.raw,
        versionParts: version.parts,
        responseTimeMs: elapsed,
        clientId: conf.CLIENT_ID,
      });
      return;
    }

    printHeader('Media Server Info');

    printKeyValue('Server', conf.SERVER_URL);
    printKeyValue('Version', version.raw);
    printKeyValue('Response time', formatDuration(elapsed));
    printBlank();

    printKeyValue('Client ID', conf.CLIENT_ID);
    printKeyValue('API prefix', conf.API_PREFIX);
    printKeyValue('Key location', conf.API_KEY_LOCATION);
    printKeyValue('Chunk size', formatSize(conf.UPLOAD_CHUNK_SIZE));
    printKeyValue('HLS batch', `${conf.UPLOAD_MAX_FILES} files`);
    printKeyValue('Timeout', `${conf.TIMEOUT}s`);
    printKeyValue('Retries', `${conf.MAX_RETRY} ${dim(`(not on ${conf.RETRY_EXCEPT.join(', ') || 'none'})`)}`);
    printBlank();
  } finally {
    await client.close();
  }
}
