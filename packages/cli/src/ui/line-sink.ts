import type { ProgressFrame, ProgressSink } from '@parloop/core';
import { percent, textBar } from './format.js';

interface LineWriter {
  write(chunk: string): unknown;
}

export function formatFrameLines(frame: ProgressFrame, barWidth = 30): string[] {
  const heading = frame.title ? `${frame.title} ` : '';
  const lines = [`${heading}[${textBar(frame.total, barWidth)}] ${percent(frame.total)}`];
  for (const worker of frame.workers ?? []) {
    const bar = textBar(worker.fraction, barWidth);
    lines.push(`  ${worker.label.padEnd(10)} [${bar}] ${percent(worker.fraction)}`);
  }
  return lines;
}

/**
 * Plain-text sink for pipes and CI logs. Writes a block of lines per frame and
 * skips frames that would print the same text as the previous one.
 */
export class LineSink implements ProgressSink {
  private readonly out: LineWriter;
  private readonly barWidth: number;
  private last = '';

  constructor(out: LineWriter = process.stdout, barWidth = 30) {
    this.out = out;
    this.barWidth = barWidth;
  }

  render(frame: ProgressFrame): void {
    const text = formatFrameLines(frame, this.barWidth).join('\n');
    if (text === this.last) return;
    this.last = text;
    this.out.write(`${text}\n`);
  }
}
