import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException } from "@nestjs/common";
import { ApiConfigService } from "../config/api.config";
import { createAuthUser, createUserRecord } from "../testing/fixtures";
import { createChallengeHarness } from "../testing/harness";
import { CausesController } from "./causes.controller";
import { ChallengesController } from "./challenges.controller";

const setup = () => {
  const harness = createChallengeHarness([
    createUserRecord(),
    createUserRecord({ id: "user-two", username: "two", email: "two@example.com", firstName: "Tom", lastName: "" })
  ]);
  const challenges = new ChallengesController(harness.challengeService, harness.userService, new ApiConfigService());
  const causes = new CausesController(harness.challengeService, harness.userService);
  return { ...harness, challenges, causes };
};

const run = (causeId: string, distanceCovered: number) => ({
  causeId,
  distanceToCover: 10,
  distanceCovered,
  duration: "00:30:00",
  activity: "Running"
});

test("ChallengesController.create returns the view with the owner summary", async () => {
  const { challenges } = setup();

  const challenge = await challenges.create(createAuthUser(), { name: "Hill Repeats", distanceToCover: 12 });

  assert.equal(challenge.slug, "hill-repeats-00000001");
  assert.equal(challenge.distanceToCover, 12);
  assert.deepEqual(challenge.owner, { id: "user-runner", fullName: "Rita Runner", username: "runner" });
  assert.equal(challenge.createdAt, "2024-03-01T08:00:00.000Z");
});

test("ChallengesController.create rejects invalid bodies", async () => {
  const { challenges } = setup();

  await assert.rejects(challenges.create(createAuthUser(), { name: "" }), BadRequestException);
});

test("ChallengesController.leaderboard joins usernames, drops unknown runners and ranks the rest", async () => {
  const { challenges, causes } = setup();
  const challenge = await challenges.create(createAuthUser(), { name: "Spring Miles" });
  const cause = await causes.create(createAuthUser(), { challengeId: challenge.id, name: "Shoes", activity: "Running" });

  await causes.recordActivity(createAuthUser(), run(cause.id, 5));
  await causes.recordActivity(createAuthUser({ id: "user-ghost", username: "ghost" }), run(cause.id, 12));
  await causes.recordActivity(createAuthUser({ id: "user-two", username: "two" }), run(cause.id, 8));

  const board = await challenges.leaderboard({});
  assert.deepEqual(
    board.map((entry) => [entry.rank, entry.username, entry.distanceCovered]),
    [
      [1, "two", 8],
      [2, "runner", 5]
    ]
  );

  const limited = await challenges.leaderboard({ limit: "2", causeId: cause.id });
  assert.deepEqual(
    limited.map((entry) => entry.username),
    ["two"]
  );
});

test("CausesController.recordActivity reports the stored run and the new cause total", async () => {
  const { challenges, causes } = setup();
  const challenge = await challenges.create(createAuthUser(), { name: "Trail Week" });
  const cause = await causes.create(createAuthUser(), { challengeId: challenge.id, name: "Bikes", activity: "Cycling" });

  const result = await causes.recordActivity(createAuthUser(), { ...run(cause.id, 3.5), activity: "Cycling" });

  assert.equal(result.message, "Activity recorded successfully");
  assert.equal(result.runner.distanceCovered, 3.5);
  assert.equal(result.runner.dateJoined, "2024-03-01T08:00:00.000Z");
  assert.equal((await causes.getById(cause.id)).distanceCovered, 3.5);
  assert.equal((await causes.listRunners(cause.id)).length, 1);
});

test("CausesController.sponsor and buy record against the cause", async () => {
  const { challenges, causes } = setup();
  const challenge = await challenges.create(createAuthUser(), { name: "River Run" });
  const cause = await causes.create(createAuthUser(), { challengeId: challenge.id, name: "Meals", activity: "Walking" });
  const sponsor = createAuthUser({ id: "user-two", username: "two" });

  const pledge = await causes.sponsor(sponsor, { causeId: cause.id, distance: 4, amountPerKm: 2.5 });
  assert.equal(pledge.totalAmount, 10);
  assert.equal(pledge.brandImg, "");

  const updated = await causes.updatePledge(sponsor, pledge.id, { amountPerKm: 3 });
  assert.equal(updated.totalAmount, 12);
  await assert.rejects(causes.updatePledge(sponsor, pledge.id, {}), BadRequestException);

  const purchase = await causes.buy(sponsor, { causeId: cause.id, amount: 20 });
  assert.equal(purchase.buyerId, "user-two");
  assert.deepEqual(
    (await causes.listPurchases(cause.id)).map((entry) => entry.amount),
    [20]
  );
});
