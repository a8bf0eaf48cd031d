import type { TaskRecord } from "../tasks/types.js";

export function detectSkipMarker(
  input: { skip?: boolean; commentBody?: string | null },
  skipCode: string,
): boolean {
  if (input.skip === true) return true;
  const code = skipCode.trim().toLowerCase();
  if (!code || !input.commentBody) return false;
  return input.commentBody.toLowerCase().includes(code);
}

/**
 * True when a task that has already been returned at least once comes back
 * with a skip marker. Has no side effects.
 */
export function shouldSkip(
  record: Pick<TaskRecord, "returnCount">,
  event: { skipMarker: boolean },
): boolean {
  return record.returnCount > 0 && event.skipMarker;
}
