/**
 * Terminal output for the probe tools: colored status lines, section
 * headers and raw writes for streamed text.
 */

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[92m",
  red: "\x1b[91m",
  yellow: "\x1b[93m",
  blue: "\x1b[94m",
  cyan: "\x1b[96m",
} as const;

export type Color = Exclude<keyof typeof colors, "reset">;

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ReporterOptions {
  color?: boolean;
  sink?: OutputSink;
  /** Width of the `=` rule under headers */
  ruleWidth?: number;
}

export class ConsoleReporter {
  readonly ruleWidth: number;
  private readonly color: boolean;
  private readonly sink: OutputSink;

  constructor(options: ReporterOptions = {}) {
    this.color = options.color ?? true;
    this.sink = options.sink ?? process.stdout;
    this.ruleWidth = options.ruleWidth ?? 70;
  }

  /**
   * Wrap text in the given styles (no-op when colors are off)
   */
  paint(text: string, ...styles: Color[]): string {
    if (!this.color || styles.length === 0) return text;
    return `${styles.map((s) => colors[s]).join("")}${text}${colors.reset}`;
  }

  rule(char = "="): string {
    return char.repeat(this.ruleWidth);
  }

  /** Write without a trailing newline */
  write(text: string): void {
    this.sink.write(text);
  }

  line(text = ""): void {
    this.sink.write(`${text}\n`);
  }

  blank(): void {
    this.line();
  }

  header(text: string): void {
    this.blank();
    this.line(this.paint(this.rule(), "cyan", "bold"));
    this.line(this.paint(text, "cyan", "bold"));
    this.line(this.paint(this.rule(), "cyan", "bold"));
  }

  success(text: string): void {
    this.line(this.paint(`✅ ${text}`, "green"));
  }

  error(text: string): void {
    this.line(this.paint(`❌ ${text}`, "red"));
  }

  info(text: string): void {
    this.line(this.paint(`ℹ️  ${text}`, "blue"));
  }

  warning(text: string): void {
    this.line(this.paint(`⚠️  ${text}`, "yellow"));
  }

  /**
   * Multi-line block in one style, e.g. the suite banner
   */
  banner(lines: string[], ...styles: Color[]): void {
    const open = this.color ? styles.map((s) => colors[s]).join("") : "";
    const close = this.color ? colors.reset : "";

    this.line(open);
    lines.forEach((text, i) => {
      this.line(i === lines.length - 1 ? `${text}${close}` : text);
    });
  }
}
