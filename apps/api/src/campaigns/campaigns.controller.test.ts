import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException } from "@nestjs/common";
import { ApiConfigService } from "../config/api.config";
import { createAuthUser, createUserRecord } from "../testing/fixtures";
import { createCampaignHarness } from "../testing/harness";
import { CampaignAdminController } from "./campaign-admin.controller";
import { CampaignsController } from "./campaigns.controller";

const setup = () => {
  const harness = createCampaignHarness([
    createUserRecord(),
    createUserRecord({ id: "user-two", username: "two", email: "two@example.com", firstName: "Tom", lastName: "" })
  ]);
  const campaigns = new CampaignsController(harness.campaignService, harness.userService, new ApiConfigService());
  const admin = new CampaignAdminController(harness.campaignService);
  return { ...harness, campaigns, admin };
};

test("CampaignsController.participate reports the started activity", async () => {
  const { campaigns } = setup();
  const campaign = await campaigns.create(createAuthUser(), { name: "Coast Relay" });

  const result = await campaigns.participate(createAuthUser(), campaign.slug, { activity: "Cycling" });

  assert.equal(result.message, "Cycling started");
  assert.equal(result.runner.campaignId, campaign.id);
  assert.equal(result.runner.duration, "");
  await assert.rejects(campaigns.participate(createAuthUser(), campaign.slug, { activity: "Flying" }), BadRequestException);
});

test("CampaignsController.leaderboard joins usernames, drops unknown runners and ranks the rest", async () => {
  const { campaigns } = setup();
  const campaign = await campaigns.create(createAuthUser(), { name: "Coast Relay" });
  const finish = async (userId: string, username: string, distanceCovered: number) => {
    const caller = createAuthUser({ id: userId, username });
    const { runner } = await campaigns.participate(caller, campaign.slug, { activity: "Running" });
    await campaigns.finishRun(caller, campaign.slug, runner.id, { distanceCovered, duration: "00:30:00" });
  };

  await finish("user-runner", "runner", 5);
  await finish("user-ghost", "ghost", 12);
  await finish("user-two", "two", 8);

  const board = await campaigns.leaderboard(campaign.slug, {});
  assert.deepEqual(
    board.map((entry) => [entry.rank, entry.username, entry.distanceCovered]),
    [
      [1, "two", 8],
      [2, "runner", 5]
    ]
  );

  const view = await campaigns.getBySlug(campaign.slug);
  assert.equal(view.distanceCovered, 25);
  assert.deepEqual(view.owner, { id: "user-runner", fullName: "Rita Runner", username: "runner" });
});

test("CampaignAdminController.createSponsorship validates the body and raises the campaign money", async () => {
  const { campaigns, admin } = setup();
  const campaign = await campaigns.create(createAuthUser(), { name: "Coast Relay" });

  const pledge = await admin.createSponsorship({ campaignId: campaign.id, sponsorId: "user-two", distance: 8, amountPerKm: 5 });

  assert.equal(pledge.totalAmount, 40);
  assert.equal(pledge.createdAt, "2024-03-01T08:00:00.000Z");
  assert.equal((await campaigns.getBySlug(campaign.slug)).moneyRaised, 40);
  await assert.rejects(admin.createSponsorship({ campaignId: campaign.id, sponsorId: "user-two" }), BadRequestException);
});
