import { MongoClient } from "mongodb";

/**
 * One client per process; the driver pools connections behind it and every
 * repository borrows from that pool.
 */
export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { maxPoolSize: 20 });
  await client.connect();
  return client;
};
