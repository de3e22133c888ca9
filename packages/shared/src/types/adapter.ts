/**
 * Result types shared by every collaborator adapter
 */

/**
 * Outcome of a single collaborator call. Failures carry the reason instead of
 * throwing, so callers decide whether to continue.
 */
export type OperationResult<T extends object = Record<never, never>> =
  | ({ success: true } & T)
  | { success: false; error: string };

/**
 * Archive upload details
 */
export interface ArchiveReceipt {
  archiveId: string;
  vault: string;
}

/**
 * Archive retrieval job details
 */
export interface RetrievalJob {
  jobId: string;
  archiveId: string;
  vault: string;
  /** Region of the vault the job runs in */
  region: string;
}
