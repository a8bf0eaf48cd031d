/**
 * Output Formatter - CLI output with chalk colors
 */

import chalk from "chalk";

export type LogLevel = "info" | "success" | "warning" | "error";

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
  align?: "left" | "right";
}

export interface Writable {
  write(chunk: string): unknown;
}

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;
  private readonly stdout: Writable;
  private readonly stderr: Writable;

  constructor(options: { quiet?: boolean; noColor?: boolean; stdout?: Writable; stderr?: Writable } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  print(message: string, level: LogLevel = "info"): void {
    if (this.quiet && level !== "error") return;
    const styled = this.noColor ? message : this.styleMessage(message, level);
    (level === "error" ? this.stderr : this.stdout).write(`${styled}\n`);
  }

  success(message: string): void {
    this.print(message, "success");
  }

  info(message: string): void {
    this.print(message, "info");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  error(message: string): void {
    this.print(message, "error");
  }

  header(title: string): void {
    if (this.quiet) return;
    this.line(
      this.noColor
        ? `\n${title}\n${"=".repeat(title.length)}`
        : `\n${chalk.bold.cyan(title)}\n${chalk.dim("=".repeat(title.length))}`,
    );
  }

  section(title: string): void {
    if (this.quiet) return;
    this.line(this.noColor ? `\n${title}:` : `\n${chalk.bold(title)}:`);
  }

  keyValue(key: string, value: string | number | boolean | null): void {
    if (this.quiet) return;
    const shown = value === null ? "-" : String(value);
    this.line(this.noColor ? `  ${key}: ${shown}` : `${chalk.dim(`  ${key}:`)} ${chalk.white(shown)}`);
  }

  table<T extends object>(data: T[], columns: TableColumn[]): void {
    if (this.quiet || data.length === 0) return;

    const cell = (row: T, key: string): string => {
      const value: unknown = Object.entries(row).find(([name]) => name === key)?.[1];
      return value === null || value === undefined ? "" : String(value);
    };
    const widths = columns.map(
      (col) => col.width ?? Math.max(col.header.length, ...data.map((row) => cell(row, col.key).length)),
    );
    const render = (values: string[]) =>
      values.map((value, i) => this.padCell(value, widths[i] ?? value.length, columns[i]?.align ?? "left")).join("  ");

    const headerRow = render(columns.map((col) => col.header));
    const separator = widths.map((w) => "-".repeat(w)).join("  ");
    this.line(this.noColor ? headerRow : chalk.bold(headerRow));
    this.line(this.noColor ? separator : chalk.dim(separator));
    for (const row of data) {
      this.line(render(columns.map((col) => cell(row, col.key))));
    }
  }

  /** JSON is printed even in quiet mode; it is the requested output. */
  json(data: unknown): void {
    this.line(JSON.stringify(data, null, 2));
  }

  status(label: string, status: "running" | "stopped" | "error"): void {
    if (this.quiet) return;
    const badges = {
      running: this.noColor ? "[RUNNING]" : chalk.bgGreen.black(" RUNNING "),
      stopped: this.noColor ? "[STOPPED]" : chalk.bgGray.white(" STOPPED "),
      error: this.noColor ? "[ERROR]" : chalk.bgRed.white(" ERROR "),
    };
    this.line(`${label}: ${badges[status]}`);
  }

  formatTime(timestamp: number | null): string {
    return timestamp === null ? "-" : new Date(timestamp).toISOString();
  }

  private line(text: string): void {
    this.stdout.write(`${text}\n`);
  }

  private styleMessage(message: string, level: LogLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      default:
        return chalk.blue("ℹ ") + message;
    }
  }

  private padCell(value: string, width: number, align: "left" | "right"): string {
    if (value.length >= width) return value.slice(0, width);
    return align === "right" ? value.padStart(width) : value.padEnd(width);
  }
}
