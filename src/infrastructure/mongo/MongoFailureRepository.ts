import type { Collection, Db, MongoClient } from "mongodb";
import type { FailureKind, FailureRecord, StoredFailureRecord } from "../../core/failures/failureRecord";
import type { FailureRepository } from "../../ports/FailureRepository";
import { COUNTERS_COLLECTION, failureCollectionNames, mongoIndexes } from "./mongo.indexes";

export type FailureDoc = {
  _id: number;
  job: string;
  operator: string;
  ip: string;
  error: string;
  timestamp: number; // epoch seconds
};

export type CounterDoc = {
  _id: string;
  seq: number;
};

export const toFailureDoc = (id: number, record: FailureRecord): FailureDoc => ({
  _id: id,
  job: record.jobId,
  operator: record.operator,
  ip: record.networkAddress,
  error: record.message,
  timestamp: record.timestampSeconds
});

/**
 * Append-only failure store. Each kind has its own collection; integer ids are
 * allocated per collection from an atomic counter document.
 */
export class MongoFailureRepository implements FailureRepository {
  private readonly collectionNames: Record<FailureKind, string>;
  private readonly prepared = new Map<FailureKind, Promise<Collection<FailureDoc>>>();

  constructor(
    private readonly client: MongoClient,
    private readonly dbName: string,
    chainLabel: string
  ) {
    this.collectionNames = failureCollectionNames(chainLabel);
  }

  private db(): Db {
    return this.client.db(this.dbName);
  }

  private getCollection(kind: FailureKind): Promise<Collection<FailureDoc>> {
    const cached = this.prepared.get(kind);
    if (cached) return cached;

    const pending = (async () => {
      const col = this.db().collection<FailureDoc>(this.collectionNames[kind]);
      for (const idx of mongoIndexes.failureCollection) {
        await col.createIndex(idx.keys, idx.options);
      }
      return col;
    })();
    // a failed index build is retried by the next insert
    void pending.catch(() => this.prepared.delete(kind));
    this.prepared.set(kind, pending);
    return pending;
  }

  private async nextId(collectionName: string): Promise<number> {
    const counters = this.db().collection<CounterDoc>(COUNTERS_COLLECTION);
    const counter = await counters.findOneAndUpdate(
      { _id: collectionName },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: "after" }
    );
    if (!counter) {
      throw new Error(`Counter for ${collectionName} was not returned after upsert`);
    }
    return counter.seq;
  }

  async insert(record: FailureRecord): Promise<StoredFailureRecord> {
    const col = await this.getCollection(record.kind);
    const id = await this.nextId(this.collectionNames[record.kind]);
    await col.insertOne(toFailureDoc(id, record));
    return { ...record, id };
  }
}
