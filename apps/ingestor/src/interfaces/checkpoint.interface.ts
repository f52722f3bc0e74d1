export type CheckpointStatus = 'success' | 'failed';

/**
 * Dedupe record for a batch payload. One per (sourceName, contentHash).
 */
export interface IngestionCheckpoint {
  id: number;
  sourceName: string;
  /** SHA-256 hex digest of the exact payload bytes */
  contentHash: string;
  status: CheckpointStatus;
  createdAt: Date;
}

export interface NewCheckpoint {
  sourceName: string;
  contentHash: string;
  status: CheckpointStatus;
}

export type BatchIngestionStatus = 'idempotent_skip' | 'processed' | 'error';

export interface BatchIngestionResult {
  status: BatchIngestionStatus;
  message: string;
  contentHash: string;
  /** Present when status is `processed` */
  recordsWritten?: number;
  /** Ledger entry of the attempt; absent for idempotent skips */
  runId?: number;
}
