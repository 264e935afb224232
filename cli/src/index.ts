import { parseArgs, hasFlag } from './lib/parse.js';
import type { ParsedFlags } from './lib/parse.js';
import { displayError, EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE } from './lib/errors.js';
import { printError, printHint, printBlank, bold, dim, cyan, showCursor } from './lib/output.js';

import * as pingCmd from './commands/ping.js';
import * as infoCmd from './commands/info.js';
import * as apiCmd from './commands/api.js';
import * as uploadCmd from './commands/upload.js';
import * as configCmd from './commands/config.js';

const commandMap: Record<string, { run: (args: string[], flags: ParsedFlags) => Promise<void> }> = {
  ping: pingCmd,
  info: infoCmd,
  api: apiCmd,
  upload: uploadCmd,
  config: configCmd,
};

const CLI_VERSION = process.env.MEDIA_API_CLI_VERSION || '1.0.0';

function printVersion(): void {
  console.log(`msc v${CLI_VERSION}`);
}

function printHelp(): void {
  console.log();
  console.log(`  ${bold('Media Server CLI')} ${dim(`v${CLI_VERSION}`)}`);
  console.log(`  ${dim('A command-line interface for the media server API.')}`);
  console.log();
  console.log(`  ${bold('Usage:')}`);
  console.log(`    msc ${cyan('<command>')} [options]`);
  console.log();
  console.log(`  ${bold('Commands:')}`);
  console.log(`    ${cyan('ping')}       Check that the server answers with the configured key`);
  console.log(`    ${cyan('info')}       Show the server version and client settings`);
  console.log(`    ${cyan('api')}        Call any API path and print the JSON response`);
  console.log(`    ${cyan('upload')}     Upload a file or an HLS playlist`);
  console.log(`    ${cyan('config')}     Manage CLI configuration`);
  console.log();
  console.log(`  ${bold('Global Options:')}`);
  console.log(`    --config <path|unix:user>  Extra configuration file or instance user`);
  console.log(`    --server <url>             Override the configured server URL`);
  console.log(`    --api-key <key>            Override the configured API key`);
  console.log(`    --verbose                  Log requests to stderr`);
  console.log(`    --no-color                 Disable colored output`);
  console.log(`    --quiet                    Suppress non-essential output`);
  console.log(`    --json                     Output results as JSON`);
  console.log(`    --version                  Show CLI version`);
  console.log(`    --help                     Show this help text`);
  console.log();
  console.log(`  ${bold('Examples:')}`);
  console.log(`    ${dim('# Configure your server')}`);
  console.log(`    msc config set SERVER_URL https://media.example.com`);
  console.log(`    msc config set API_KEY <key>`);
  console.log();
  console.log(`    ${dim('# List channels')}`);
  console.log(`    msc api channels/tree --param parent_oid=c1234`);
  console.log();
  console.log(`    ${dim('# Upload a video')}`);
  console.log(`    msc upload -i lecture.mp4 --title "Lecture 1" --channel c1234`);
  console.log();
}

function printCommandHelp(command: string): void {
  switch (command) {
    case 'ping':
      console.log();
      console.log(`  ${bold('msc ping')} - Check the server connection`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    msc ping [--server <url>] [--api-key <key>]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    --quiet                   Only print "ok"`);
      console.log(`    --json                    Output the server response as JSON`);
      console.log();
      break;

    case 'info':
      console.log();
      console.log(`  ${bold('msc info')} - Show server information`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    msc info [--server <url>]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    --server <url>            Server URL (overrides config)`);
      console.log(`    --json                    Output as JSON`);
      console.log();
      break;

    case 'api':
      console.log();
      console.log(`  ${bold('msc api')} - Call an API path`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    msc api <path> [options]`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -X, --method <method>     HTTP method ${dim('default: GET, or POST with --data')}`);
      console.log(`    -p, --param <k=v>         Query parameter (repeatable)`);
      console.log(`    -d, --data <k=v>          Body field (repeatable)`);
      console.log();
      console.log(`  ${bold('Examples:')}`);
      console.log(`    msc api medias/get --param oid=v1234`);
      console.log(`    msc api medias/edit -d oid=v1234 -d title="New title"`);
      console.log();
      break;

    case 'upload':
      console.log();
      console.log(`  ${bold('msc upload')} - Upload a file or an HLS playlist`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    msc upload -i <file> [options]`);
      console.log();
      console.log(`  ${bold('Required:')}`);
      console.log(`    -i, --input <file>        File to upload`);
      console.log();
      console.log(`  ${bold('Options:')}`);
      console.log(`    -t, --title <title>       Media title`);
      console.log(`    -c, --channel <oid>       Target channel`);
      console.log(`    --field <k=v>             Extra media field (repeatable)`);
      console.log(`    --remote-path <dir/path>  Only upload the file to this destination`);
      console.log(`    --remote-dir <dir>        Directory for an .m3u8 input and its fragments`);
      console.log(`    --quiet                   Only print the media OID, upload ID or directory`);
      console.log(`    --json                    Output result as JSON`);
      console.log();
      break;

    case 'config':
      console.log();
      console.log(`  ${bold('msc config')} - Manage CLI configuration`);
      console.log();
      console.log(`  ${bold('Usage:')}`);
      console.log(`    msc config <action> [key] [value]`);
      console.log();
      console.log(`  ${bold('Actions:')}`);
      console.log(`    set <key> <value>         Set a configuration value`);
      console.log(`    get <key>                 Get a configuration value`);
      console.log(`    list                      Show all configuration`);
      console.log(`    reset                     Reset to defaults`);
      console.log(`    path                      Show config file location`);
      console.log();
      console.log(`  ${bold('Keys:')}`);
      console.log(`    SERVER_URL                Server base URL`);
      console.log(`    API_KEY                   API key`);
      console.log(`    TIMEOUT                   Request timeout in seconds`);
      console.log(`    MAX_RETRY                 Retries for transient failures`);
      console.log(`    UPLOAD_CHUNK_SIZE         Chunk size in bytes`);
      console.log(`    UPLOAD_MAX_FILES          Files per HLS upload request`);
      console.log(`    ${dim('Run "msc config list" for all keys.')}`);
      console.log();
      break;

    default:
      printHelp();
  }
}

async function main(): Promise<void> {
  const { command, args, flags } = parseArgs(process.argv);

  // Global flags
  if (hasFlag(flags, 'version')) {
    printVersion();
    process.exit(EXIT_SUCCESS);
  }

  if (!command) {
    printHelp();
    process.exit(EXIT_SUCCESS);
  }

  // Command-level help
  if (hasFlag(flags, 'help')) {
    printCommandHelp(command);
    process.exit(EXIT_SUCCESS);
  }

  const mod = Object.hasOwn(commandMap, command) ? commandMap[command] : undefined;
  if (!mod) {
    printError(`Unknown command: "${command}"`);
    printHint('Run "msc --help" to see available commands.');
    printBlank();
    process.exit(EXIT_USAGE);
  }

  try {
    await mod.run(args, flags);
  } catch (err) {
    showCursor();
    const exitCode = displayError(err);
    printBlank();
    process.exit(exitCode);
  }
}

// Ensure cursor is restored on exit
process.on('exit', () => showCursor());
process.on('uncaughtException', (err) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(EXIT_ERROR);
});

main().catch((err) => {
  showCursor();
  displayError(err);
  printBlank();
  process.exit(EXIT_ERROR);
});
