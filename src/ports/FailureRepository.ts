import type { FailureRecord, StoredFailureRecord } from "../core/failures/failureRecord";

export interface FailureRepository {
  insert(record: FailureRecord): Promise<StoredFailureRecord>;
}
