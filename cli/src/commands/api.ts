import type { ParsedFlags } from '../lib/parse.js';
import { getFlag, getFlagArray, parseHttpMethod, parseKeyValues } from '../lib/parse.js';
import { createClient } from '../lib/client.js';
import { exitUsage } from '../lib/errors.js';
import { printJson } from '../lib/output.js';

export async function run(args: string[], flags: ParsedFlags): Promise<void> {
  const path = args[0];
  if (!path) exitUsage('Usage: msc api <path> [--method <method>] [--param k=v ...] [--data k=v ...]');

  const params = parseKeyValues(getFlagArray(flags, 'param', 'p'));
  const data = parseKeyValues(getFlagArray(flags, 'data', 'd'));
  const hasData = Object.keys(data).length > 0;
  const method = parseHttpMethod(getFlag(flags, 'method', 'X') ?? (hasData ? 'POST' : 'GET'));

  const client = await createClient(flags);
  try {
    const result = await client.api(path, {
      method,
      ...(Object.keys(params).length > 0 ? { params } : {}),
      ...(hasData ? { data } : {}),
    });
    printJson(result);
  } finally {
    await client.close();
  }
}
