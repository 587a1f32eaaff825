import { BatchType } from './message-types';

export interface BatchCandidate {
  batchType: BatchType;
  uploadedAt: Date;
}

function latest<T extends BatchCandidate>(candidates: readonly T[]): T | undefined {
  return candidates.reduce<T | undefined>(
    (best, batch) =>
      !best || batch.uploadedAt.getTime() > best.uploadedAt.getTime() ? batch : best,
    undefined,
  );
}

/**
 * The batch that represents a lecture: the latest confirmed upload, else
 * the latest upload of any type
 */
export function selectEffectiveBatch<T extends BatchCandidate>(
  batches: readonly T[],
): T | undefined {
  return (
    latest(batches.filter((batch) => batch.batchType === BatchType.CONFIRMED)) ??
    latest(batches)
  );
}
