import pc from 'picocolors';
import type { Stoppable, TextSink } from '../../../src/shared/fatal.js';

export const SPINNER_GLYPHS = ['/', '-', '\\'] as const;

export const DEFAULT_STATUS = 'Updating Narnia packages...';

const CLEAR_LINE = '\r\x1b[K';

/**
 * Spinner cursor, owned by one reporter
 */
export interface SpinnerState {
  glyphIndex: number;
}

export interface StepOrdinal {
  current: number;
  total: number;
}

export interface ProgressReporterOptions {
  output?: TextSink;
  state?: SpinnerState;
  status?: string;
  color?: boolean;
}

/**
 * Single-line, overwritable progress display.
 *
 * `tick` redraws the line in place; `done` and `skip` print the one
 * persistent line per step.
 */
export class ProgressReporter implements Stoppable {
  private readonly output: TextSink;
  private readonly state: SpinnerState;
  private readonly status: string;
  private readonly colors: ReturnType<typeof pc.createColors>;
  private lineDirty = false;

  constructor(options: ProgressReporterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.state = options.state ?? { glyphIndex: 0 };
    this.status = options.status ?? DEFAULT_STATUS;
    this.colors = pc.createColors(options.color ?? (process.stdout.isTTY === true));
  }

  tick(label: string): void {
    const glyph = SPINNER_GLYPHS[this.state.glyphIndex % SPINNER_GLYPHS.length];
    this.state.glyphIndex = (this.state.glyphIndex + 1) % SPINNER_GLYPHS.length;
    this.output.write(`${CLEAR_LINE}${glyph} ${this.status} ${this.colors.dim(label)}`);
    this.lineDirty = true;
  }

  done(message: string, ordinal?: StepOrdinal): void {
    this.finalLine(this.colors.green('✓'), message, ordinal);
  }

  skip(message: string, ordinal?: StepOrdinal): void {
    this.finalLine(this.colors.dim('·'), message, ordinal);
  }

  /**
   * Erase a half-drawn frame so nothing is left animating on screen
   */
  stop(): void {
    if (!this.lineDirty) return;
    this.output.write(CLEAR_LINE);
    this.lineDirty = false;
  }

  private finalLine(mark: string, message: string, ordinal?: StepOrdinal): void {
    const counter = ordinal ? `${this.colors.dim(`[${ordinal.current}/${ordinal.total}]`)} ` : '';
    this.output.write(`${CLEAR_LINE}${mark} ${counter}${message}\n`);
    this.lineDirty = false;
  }
}
