/**
 * CLI spinner and tool call visualization.
 *
 * Shows an animated spinner while waiting for the first token,
 * then transitions to streaming text. Tool calls get one-line
 * summaries before and after execution.
 */

import { summarizeArgs } from './agent/tool-calls.js';
import type { Styler } from './term.js';
import type { ToolCallEvent, ToolResultEvent } from './types.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL = 80; // ms per frame

export type SpinnerOutput = {
  write(s: string): unknown;
  isTTY?: boolean;
};

export class CliSpinner {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private startTime = Date.now();
  private currentTool: string | null = null;
  private firstDelta = false;
  private readonly animated: boolean;
  private readonly S: Styler;
  private readonly out: SpinnerOutput;

  constructor(opts: { styler: Styler; enabled?: boolean; out?: SpinnerOutput }) {
    this.S = opts.styler;
    this.out = opts.out ?? process.stderr;
    this.animated = opts.enabled !== false && this.out.isTTY === true && process.env.TERM !== 'dumb';
  }

  /** Start the spinner. Call before runTurn(). */
  start(): void {
    this.startTime = Date.now();
    this.frame = 0;
    this.firstDelta = false;
    this.currentTool = null;
    this.startTimer();
  }

  /** Called on first token: stop the spinner and let streaming begin. */
  onFirstDelta(): void {
    if (this.firstDelta) return;
    this.firstDelta = true;
    this.clearLine();
    this.stopTimer();
  }

  /** Called before a tool executes. */
  onToolCall(event: ToolCallEvent): void {
    this.clearLine();
    this.stopTimer();
    this.out.write(this.S.dim(`  ◆ ${event.name} ${argSummary(event)}`) + '\n');

    this.currentTool = event.name;
    this.startTime = Date.now();
    this.startTimer();
  }

  /** Called after a tool completes. */
  onToolResult(event: ToolResultEvent): void {
    this.clearLine();
    this.stopTimer();
    this.currentTool = null;

    const icon = event.success ? this.S.green('✓') : this.S.red('✗');
    this.out.write(`  ${icon} ${this.S.dim(`${event.name}: ${event.summary}`)}\n`);

    // the next round streams a fresh answer
    this.firstDelta = false;
    this.startTime = Date.now();
    this.startTimer();
  }

  /** Stop spinner completely. Call after runTurn() returns. */
  stop(): void {
    this.clearLine();
    this.stopTimer();
  }

  private startTimer(): void {
    if (!this.animated || this.timer) return;
    this.timer = setInterval(() => this.render(), INTERVAL);
  }

  private render(): void {
    if (this.firstDelta && !this.currentTool) return;
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    const f = FRAMES[this.frame % FRAMES.length];
    this.frame++;

    const text = this.currentTool ? `${f} Running ${this.currentTool}... (${elapsed}s)` : `${f} Thinking... (${elapsed}s)`;
    this.out.write(`\r${this.S.dim(text)}`);
  }

  private clearLine(): void {
    if (!this.animated) return;
    this.out.write('\r\x1b[K');
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

export function argSummary(event: ToolCallEvent): string {
  const a = event.args;
  const p = typeof a.path === 'string' ? a.path : '';
  switch (event.name) {
    case 'read_file':
    case 'file_info':
    case 'write_file':
      return p;
    case 'update_file': {
      const op = typeof a.operation === 'string' ? a.operation : '?';
      return a.operation === 'insert_at_line' ? `${p} (${op} ${String(a.line_number ?? '?')})` : `${p} (${op})`;
    }
    case 'list_directory':
      return p || '.';
    case 'search_files': {
      const root = [a.root, a.directory, a.path].find((v) => typeof v === 'string') ?? '.';
      return `"${String(a.pattern ?? '')}" in ${String(root)}`;
    }
    default:
      return summarizeArgs(a);
  }
}
