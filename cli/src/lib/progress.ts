import { formatSize } from '@media-api/core';
import type { UploadProgressEvent } from '@media-api/core';
import { formatEta } from './format.js';
import { clearLine, cursorUp, hideCursor, paint, showCursor } from './output.js';

const FILLED = '━';
const HEAD = '╺';
const EMPTY = '─';
const MIN_BAR_WIDTH = 10;
const MAX_BAR_WIDTH = 50;
const RATE_WINDOW_MS = 3000;
const FRAME_INTERVAL_MS = 67;

/**
 * Transfer rate over a sliding window, exponentially smoothed.
 */
export class RateMeter {
  private samples: Array<{ time: number; bytes: number }> = [];
  private smoothed = 0;

  /** Record `bytes` transferred so far at `time` (ms) and return the rate in bytes/s. */
  add(time: number, bytes: number): number {
    this.samples.push({ time, bytes });
    while (this.samples.length > 2 && this.samples[0].time < time - RATE_WINDOW_MS) {
      this.samples.shift();
    }
    const oldest = this.samples[0];
    const seconds = (time - oldest.time) / 1000;
    if (seconds > 0) {
      const raw = (bytes - oldest.bytes) / seconds;
      this.smoothed = this.smoothed === 0 ? raw : this.smoothed * 0.7 + raw * 0.3;
    }
    return this.smoothed;
  }
}

/** One progress line, before colouring. */
export interface ProgressLine {
  filled: number;
  empty: number;
  percent: string;
  rate: string;
  eta: string;
  done: boolean;
}

/**
 * Lay out the bar and its suffix for a terminal `columns` wide. A rate of 0
 * means none is known yet.
 */
export function layoutProgressLine(
  evt: Pick<UploadProgressEvent, 'percent' | 'processedBytes' | 'totalBytes'>,
  bytesPerSecond: number,
  columns: number
): ProgressLine {
  const pct = Math.min(100, Math.max(0, evt.percent));
  const done = pct >= 100;
  const percent = `${Math.floor(pct)}%`.padStart(4);
  const rate = bytesPerSecond > 0 ? formatSize(bytesPerSecond, 'B/s') : '---';

  let eta = '';
  if (done) eta = 'Done';
  else if (bytesPerSecond > 0) eta = `ETA ${formatEta((evt.totalBytes - evt.processedBytes) / bytesPerSecond)}`;

  // "  [" + bar + "] " + suffix, with room to spare.
  const suffixWidth = `${percent}  ${rate}  ${eta}`.length;
  const width = Math.max(MIN_BAR_WIDTH, Math.min(columns - suffixWidth - 6, MAX_BAR_WIDTH));
  const filled = Math.round((pct / 100) * width);
  return { filled, empty: width - filled, percent, rate, eta, done };
}

function paintLine(line: ProgressLine): string {
  let bar: string;
  if (line.done) bar = paint(FILLED.repeat(line.filled), 'green');
  else if (line.filled === 0) bar = paint(EMPTY.repeat(line.empty), 'dim');
  else bar = paint(FILLED.repeat(line.filled - 1) + HEAD, 'cyan') + paint(EMPTY.repeat(line.empty), 'dim');
  const eta = line.done ? paint(line.eta, 'green') : line.eta;
  return `  [${bar}] ${line.percent}  ${line.rate}  ${eta}`;
}

/**
 * Redraws upload progress in place. Does nothing unless stdout is a terminal.
 */
export class ProgressRenderer {
  private readonly meter = new RateMeter();
  private started = false;
  private lastFrameAt = 0;
  private drawnLines = 0;
  private finished = false;

  constructor(private readonly fileName: string) { }

  update(evt: UploadProgressEvent): void {
    if (this.finished || !process.stdout.isTTY) return;

    const now = Date.now();
    if (!this.started) {
      this.started = true;
      hideCursor();
    }
    const rate = this.meter.add(now, evt.processedBytes);

    if (now - this.lastFrameAt < FRAME_INTERVAL_MS && evt.percent < 100) return;
    this.lastFrameAt = now;

    if (evt.phase !== 'chunk' && evt.phase !== 'done') {
      this.draw([`  ${paint(evt.text, 'dim')}`]);
      return;
    }

    const line = layoutProgressLine(evt, rate, process.stdout.columns || 80);
    const lines = [paintLine(line)];
    if (!line.done) {
      const chunk = evt.chunkIndex !== undefined && evt.totalChunks !== undefined
        ? ` ${paint(`[chunk ${evt.chunkIndex + 1}/${evt.totalChunks}]`, 'dim')}`
        : '';
      lines.unshift(`  ${this.fileName}${chunk}`);
    }
    this.draw(lines);
  }

  private draw(lines: string[]): void {
    cursorUp(this.drawnLines - 1);
    lines.forEach((text, i) => {
      clearLine();
      process.stdout.write(text + (i < lines.length - 1 ? '\n' : '\r'));
    });

    // Blank out lines left over from a taller frame.
    const leftover = this.drawnLines - lines.length;
    for (let i = 0; i < leftover; i++) {
      process.stdout.write('\n');
      clearLine();
    }
    cursorUp(leftover);
    this.drawnLines = lines.length;
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    showCursor();
    if (process.stdout.isTTY && this.drawnLines > 0) process.stdout.write('\n');
  }
}
