import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { config as loadEnv } from "dotenv";
import mongoose from "mongoose";

import { CauseRunnerEntity, CauseRunnerSchema } from "../src/challenges/schemas/cause-runner.schema";
import { CauseEntity, CauseSchema } from "../src/challenges/schemas/cause.schema";
import { ChallengeEntity, ChallengeSchema } from "../src/challenges/schemas/challenge.schema";
import { createSlug } from "../src/common/slug";
import { loadApiConfig } from "../src/config/api.config";
import { apiLogger } from "../src/observability/logger";
import { UserEntity, UserSchema } from "../src/users/schemas/user.schema";

const SEED_TIME = new Date("2024-01-15T07:00:00.000Z");

const CHALLENGE_ID = "5eed0001000000000000000000000001";
const CAUSE_ID = "5eed0002000000000000000000000001";

interface SeedUser {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
}

interface SeedRun {
  id: string;
  ownerId: string;
  distanceCovered: number;
  duration: string;
}

const users: SeedUser[] = [
  { id: "5eed0000000000000000000000000001", username: "coach", email: "coach@runfund.local", firstName: "Casey", lastName: "Coach", isStaff: true },
  { id: "5eed0000000000000000000000000002", username: "strider", email: "strider@runfund.local", firstName: "Sam", lastName: "Strider", isStaff: false },
  { id: "5eed0000000000000000000000000003", username: "pacer", email: "pacer@runfund.local", firstName: "Pat", lastName: "Pacer", isStaff: false }
];

const runs: SeedRun[] = [
  { id: "5eed0003000000000000000000000001", ownerId: "5eed0000000000000000000000000002", distanceCovered: 8.4, duration: "00:48:10" },
  { id: "5eed0003000000000000000000000002", ownerId: "5eed0000000000000000000000000003", distanceCovered: 5.2, duration: "00:31:45" },
  { id: "5eed0003000000000000000000000003", ownerId: "5eed0000000000000000000000000003", distanceCovered: 3, duration: "" }
];

/**
 * Seeds a small, deterministic dataset for local development. Every write is
 * an upsert keyed by a fixed id, so the script can be re-run safely.
 */
async function seedDatabase() {
  bootstrapEnv();

  const { mongodbUri } = loadApiConfig();

  const UserModel = mongoose.model<UserEntity>(UserEntity.name, UserSchema);
  const ChallengeModel = mongoose.model<ChallengeEntity>(ChallengeEntity.name, ChallengeSchema);
  const CauseModel = mongoose.model<CauseEntity>(CauseEntity.name, CauseSchema);
  const CauseRunnerModel = mongoose.model<CauseRunnerEntity>(CauseRunnerEntity.name, CauseRunnerSchema);

  const connection = await mongoose.connect(mongodbUri);

  try {
    for (const user of users) {
      const { id, ...fields } = user;
      await UserModel.updateOne(
        { _id: id },
        {
          $set: { ...fields, updatedAt: SEED_TIME },
          $setOnInsert: { dateJoined: SEED_TIME, createdAt: SEED_TIME }
        },
        { upsert: true }
      ).exec();
    }

    const [owner] = users;
    if (!owner) {
      throw new Error("Seed users are missing an owner.");
    }

    await ChallengeModel.updateOne(
      { _id: CHALLENGE_ID },
      {
        $set: {
          ownerId: owner.id,
          name: "Winter Base Miles",
          description: "Log easy miles through January to fund new running shoes for the youth club.",
          mode: "Free",
          distanceToCover: 100,
          slug: createSlug("Winter Base Miles", CHALLENGE_ID),
          members: users.map((user) => user.id),
          updatedAt: SEED_TIME
        },
        $setOnInsert: { createdAt: SEED_TIME }
      },
      { upsert: true }
    ).exec();

    await CauseModel.updateOne(
      { _id: CAUSE_ID },
      {
        $set: {
          challengeId: CHALLENGE_ID,
          ownerId: owner.id,
          name: "Youth Club Shoes",
          activity: "Running",
          problem: "Club members train in worn-out shoes.",
          distanceCovered: runs.reduce((total, run) => total + run.distanceCovered, 0),
          slug: createSlug("Youth Club Shoes", CAUSE_ID),
          members: runs.map((run) => run.ownerId),
          updatedAt: SEED_TIME
        },
        $setOnInsert: { createdAt: SEED_TIME }
      },
      { upsert: true }
    ).exec();

    for (const run of runs) {
      const { id, ...fields } = run;
      await CauseRunnerModel.updateOne(
        { _id: id },
        {
          $set: {
            ...fields,
            causeId: CAUSE_ID,
            distanceToCover: 10,
            activity: "Running",
            dateJoined: SEED_TIME,
            updatedAt: SEED_TIME
          },
          $setOnInsert: { createdAt: SEED_TIME }
        },
        { upsert: true }
      ).exec();
    }

    apiLogger.info(
      { event: "seed.complete", users: users.length, runs: runs.length },
      "Seeded users, a challenge, a cause and its runners"
    );
  } finally {
    await connection.connection.close();
  }
}

/**
 * Loads local environment overrides before connecting to MongoDB.
 */
function bootstrapEnv() {
  const cwd = process.cwd();
  const envCandidates = [".env.seed", ".env.local", ".env"].map((file) => resolve(cwd, file));

  for (const path of envCandidates) {
    if (existsSync(path)) {
      loadEnv({ path, override: false });
    }
  }
}

seedDatabase().catch((error: unknown) => {
  apiLogger.error({ err: error, event: "seed.failed" }, "Seeding failed");
  process.exitCode = 1;
});
