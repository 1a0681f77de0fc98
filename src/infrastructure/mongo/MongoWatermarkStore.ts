import type { MongoClient } from "mongodb";
import type { WatermarkStore } from "../../ports/WatermarkStore";
import { WATERMARKS_COLLECTION } from "./mongo.indexes";

export type WatermarkDoc = {
  _id: string; // chain label
  block: number;
  updatedAt: Date;
};

export class MongoWatermarkStore implements WatermarkStore {
  constructor(
    private readonly client: MongoClient,
    private readonly dbName: string,
    private readonly chainLabel: string
  ) {}

  private collection() {
    return this.client.db(this.dbName).collection<WatermarkDoc>(WATERMARKS_COLLECTION);
  }

  async load(): Promise<number | undefined> {
    const doc = await this.collection().findOne({ _id: this.chainLabel });
    return doc?.block;
  }

  async save(block: number): Promise<void> {
    // $max keeps the stored cursor monotonic even if saves land out of order
    await this.collection().updateOne(
      { _id: this.chainLabel },
      { $max: { block }, $set: { updatedAt: new Date() } },
      { upsert: true }
    );
  }
}
