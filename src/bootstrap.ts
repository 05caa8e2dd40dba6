// src/bootstrap.ts
//
// Builds the production ReminderContext from config: one ioredis client for
// the job store, one MongoClient for payables.

import IORedis from "ioredis";
import { MongoClient } from "mongodb";
import type { AppConfig } from "./config";
import type { ReminderContext } from "./context";
import { createFieldCipher } from "./infra/fieldCipher";
import { MongoPayableStore, PAYABLES_COLLECTION } from "./infra/mongoPayableStore";
import { RedisJobStore } from "./infra/redisJobStore";
import { systemClock } from "./lib/time";
import { getNotifyPort } from "./ports/NotifyPort";

export interface Runtime {
  context: ReminderContext;
  redis: IORedis;
  close(): Promise<void>;
}

export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const redis = new IORedis(config.redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false
  });
  const mongo = new MongoClient(config.mongoUrl);
  await mongo.connect();

  const context: ReminderContext = {
    jobs: new RedisJobStore(redis),
    payables: new MongoPayableStore(mongo.db(config.mongoDb).collection(PAYABLES_COLLECTION)),
    notify: getNotifyPort(config.notifyDriver),
    cipher: createFieldCipher(config.secretKey),
    clock: systemClock,
    policy: config.policy
  };

  return {
    context,
    redis,
    async close() {
      await Promise.all([redis.quit(), mongo.close()]);
    }
  };
}
