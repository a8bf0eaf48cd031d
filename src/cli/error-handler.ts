/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";

import { TaskgateError, type ErrorCode } from "../errors.js";

const ERROR_MESSAGES: Record<ErrorCode, { title: string; help: string }> = {
  TASKGATE_ERROR: {
    title: "Error",
    help: "Run 'taskgate --help' for usage information.",
  },
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your taskgate.config.json file for issues.",
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  RUNTIME_ERROR: {
    title: "Runtime Error",
    help: "Make sure the service is running with 'taskgate start'.",
  },
  STORAGE_ERROR: {
    title: "Storage Error",
    help: "Check that the database file exists and is writable.",
  },
  INVARIANT_ERROR: {
    title: "Invariant Violation",
    help: "The task record was left unchanged.",
  },
  SERVICE_UNAVAILABLE: {
    title: "Service Unavailable",
    help: "Check that the configured service URLs are reachable.",
  },
  SERVICE_ERROR: {
    title: "Service Error",
    help: "The service answered with a failure; check its logs.",
  },
  TRACKER_ERROR: {
    title: "Issue Tracker Error",
    help: "Check tracker.baseUrl, JIRA_EMAIL and JIRA_API_TOKEN.",
  },
};

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof TaskgateError) {
    const meta = ERROR_MESSAGES[err.code];
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);

    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }

    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);

    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler: errors are printed and set a non-zero exit code.
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean; report?: (text: string) => void } = {},
): (...args: T) => Promise<R | undefined> {
  const report = options.report ?? ((text: string) => console.error(text));
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      report(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}
