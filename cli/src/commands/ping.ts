import type { ParsedFlags } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { formatDuration } from '../lib/format.js';
import { dim, outputMode, printBlank, printJson, printKeyValue, printSuccess } from '../lib/output.js';

export async function run(_args: string[], flags: ParsedFlags): Promise<void> {
  const client = await createClient(flags);
  try {
    const begin = Date.now();
    const result = await client.checkServer();
    const elapsed = Date.now() - begin;

    const mode = outputMode(flags);
    if (mode === 'json') {
      printJson(result);
      return;
    }
    if (mode === 'quiet') {
      console.log('ok');
      return;
    }

    printBlank();
    printSuccess(`Server ${client.config.SERVER_URL} is reachable ${dim(`(${formatDuration(elapsed)})`)}`);
    printBlank();
    for (const [key, value] of Object.entries(result)) {
      if (value === null || typeof value !== 'object') printKeyValue(key, String(value));
    }
    printBlank();
  } finally {
    await client.close();
  }
}
