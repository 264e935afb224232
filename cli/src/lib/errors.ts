import {
  AbortError,
  ApiError,
  ConfigurationError,
  HttpStatusError,
  MediaClientError,
  TimeoutError,
  TransportError,
  UploadError,
  ValidationError,
} from '@media-api/core';
import { printError, printHint, printWarning, printBlank } from './output.js';

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_NETWORK = 3;
export const EXIT_PROTOCOL = 4;
export const EXIT_FS = 5;
export const EXIT_CANCELLED = 130;

const FS_ERROR_CODES = ['ENOENT', 'EACCES', 'EPERM', 'EISDIR'];

function isFsError(err: Error): boolean {
  if ('code' in err && typeof err.code === 'string' && FS_ERROR_CODES.includes(err.code)) return true;
  return FS_ERROR_CODES.some(code => err.message.includes(code));
}

export function displayError(err: unknown): number {
  if (err instanceof AbortError) {
    printWarning('Operation cancelled.');
    return EXIT_CANCELLED;
  }

  if (err instanceof ConfigurationError) {
    printError(err.message);
    printHint('Run "msc config set SERVER_URL <url>" and "msc config set API_KEY <key>", or pass --config.');
    return EXIT_USAGE;
  }

  if (err instanceof ValidationError) {
    printError(err.message);
    return EXIT_USAGE;
  }

  if (err instanceof TimeoutError) {
    printError(err.message);
    printHint('Try again or raise TIMEOUT in the configuration.');
    return EXIT_NETWORK;
  }

  if (err instanceof HttpStatusError) {
    printError(err.message);
    if (err.status === 401 || err.status === 403) {
      printHint('Check that the API key is valid for this server.');
    }
    return EXIT_NETWORK;
  }

  if (err instanceof TransportError) {
    printError(err.message);
    printHint('Check that the server URL is correct and the server is running.');
    return EXIT_NETWORK;
  }

  if (err instanceof ApiError || err instanceof UploadError) {
    printError(err.message);
    return EXIT_PROTOCOL;
  }

  if (err instanceof MediaClientError) {
    printError(err.message);
    return EXIT_ERROR;
  }

  if (err instanceof Error) {
    printError(err.message);
    return isFsError(err) ? EXIT_FS : EXIT_ERROR;
  }

  printError(String(err));
  return EXIT_ERROR;
}

export function exitUsage(message: string): never {
  printError(message);
  printHint('Run "msc --help" for usage information.');
  printBlank();
  process.exit(EXIT_USAGE);
}
