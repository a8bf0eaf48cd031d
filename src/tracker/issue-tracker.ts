export interface IssueTracker {
  readonly name: string;
  addComment(taskId: string, body: string): Promise<void>;
  /** Moves the issue to `status`. Resolves false when no such transition exists. */
  transition(taskId: string, status: string): Promise<boolean>;
}

/** Used when tracker integration is disabled. */
export class NullIssueTracker implements IssueTracker {
  readonly name = "none";

  async addComment(): Promise<void> {}

  async transition(): Promise<boolean> {
    return false;
  }
}
