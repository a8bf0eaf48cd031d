import { errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { ProcessOutcome } from "../webhook/outcome.js";
import type { IssueTracker } from "./issue-tracker.js";

export interface NotifierOptions {
  tracker: IssueTracker;
  logger: Logger;
  comments: boolean;
  autoReturn: boolean;
  returnStatus: string;
}

export function formatComment(outcome: ProcessOutcome): string | null {
  switch (outcome.kind) {
    case "completed":
      return `Automated check passed with a compliance score of ${formatScore(outcome.score)}. Follow-up service completed.`;
    case "returned":
      return `Compliance score ${formatScore(outcome.score)} is below the required ${formatScore(outcome.threshold)}. The task has been returned for rework.`;
    case "skipped":
      return `Skip code detected after ${outcome.record.returnCount} return(s). Automated checks were bypassed.`;
    case "failed":
      return `Automated check failed at ${outcome.stage} (${outcome.code}): ${outcome.error}`;
    default:
      return null;
  }
}

function formatScore(score: number): string {
  return `${Number.isInteger(score) ? score : score.toFixed(1)}%`;
}

/**
 * Reports pipeline outcomes back to the issue tracker. Tracker failures are
 * logged and never reach the caller.
 */
export class Notifier {
  private readonly tracker: IssueTracker;
  private readonly logger: Logger;
  private readonly comments: boolean;
  private readonly autoReturn: boolean;
  private readonly returnStatus: string;

  constructor(options: NotifierOptions) {
    this.tracker = options.tracker;
    this.logger = options.logger.child({ component: "notifier" });
    this.comments = options.comments;
    this.autoReturn = options.autoReturn;
    this.returnStatus = options.returnStatus;
  }

  async notify(outcome: ProcessOutcome): Promise<void> {
    const comment = this.comments ? formatComment(outcome) : null;
    if (comment && outcome.taskId) {
      try {
        await this.tracker.addComment(outcome.taskId, comment);
      } catch (err) {
        this.logger.warn({ taskId: outcome.taskId, error: errorMessage(err) }, "tracker comment failed");
      }
    }
    if (outcome.kind === "returned" && this.autoReturn) {
      try {
        const moved = await this.tracker.transition(outcome.taskId, this.returnStatus);
        if (moved) {
          this.logger.info({ taskId: outcome.taskId, status: this.returnStatus }, "task moved to return status");
        }
      } catch (err) {
        this.logger.warn({ taskId: outcome.taskId, error: errorMessage(err) }, "tracker transition failed");
      }
    }
  }
}
