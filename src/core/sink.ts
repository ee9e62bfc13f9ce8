export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'savedColor';

/** Where rendered diagnostics go. */
export interface OutputSink {
  write(text: string): void;
  hasColors(): boolean;
  changeColor(color: Color, bold?: boolean): void;
  resetColor(): void;
}

const COLOR_CODES: Record<Exclude<Color, 'savedColor'>, number> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
};

export const RESET = '\x1b[0m';

export function colorSequence(color: Color, bold = false): string {
  // 'savedColor' keeps the terminal's current colour and only toggles weight
  if (color === 'savedColor') return bold ? '\x1b[1m' : '';
  return `\x1b[0;${bold ? '1;' : ''}3${COLOR_CODES[color]}m`;
}

abstract class AnsiSink implements OutputSink {
  abstract write(text: string): void;
  abstract hasColors(): boolean;

  changeColor(color: Color, bold = false): void {
    if (this.hasColors()) this.write(colorSequence(color, bold));
  }

  resetColor(): void {
    if (this.hasColors()) this.write(RESET);
  }
}

export interface SinkOptions {
  colors?: boolean;
}

/** Collects everything written; used for tests and `renderDiagnostic`. */
export class StringSink extends AnsiSink {
  private chunks: string[] = [];
  private readonly colors: boolean;

  constructor(options: SinkOptions = {}) {
    super();
    this.colors = options.colors ?? false;
  }

  write(text: string): void {
    this.chunks.push(text);
  }

  hasColors(): boolean {
    return this.colors;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export interface WritableLike {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export function detectColors(stream: WritableLike, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== '0';
  return stream.isTTY === true;
}

export class StreamSink extends AnsiSink {
  private readonly colors: boolean;

  constructor(private readonly stream: WritableLike, options: SinkOptions = {}) {
    super();
    this.colors = options.colors ?? detectColors(stream);
  }

  write(text: string): void {
    this.stream.write(text);
  }

  hasColors(): boolean {
    return this.colors;
  }
}

export function stderrSink(options: SinkOptions = {}): StreamSink {
  return new StreamSink(process.stderr, options);
}
