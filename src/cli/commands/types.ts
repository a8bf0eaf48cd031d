import type { OutputFormatter } from "../output-formatter.js";

export interface CommandOptions {
  json?: boolean;
  quiet?: boolean;
  out?: OutputFormatter;
}
