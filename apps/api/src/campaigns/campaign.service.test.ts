import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException, ForbiddenException, NotFoundException } from "@nestjs/common";
import {
  createCampaignInputSchema,
  createCampaignRunnerInputSchema,
  createSponsorCampaignInputSchema,
  sponsorCampaignInputSchema
} from "@runfund/types";
import { createUserRecord } from "../testing/fixtures";
import { createCampaignHarness } from "../testing/harness";

const OWNER = "user-owner";
const RUNNER = "user-runner";
const SPONSOR = "user-sponsor";

const users = [
  createUserRecord({ id: OWNER, username: "owner", email: "owner@example.com" }),
  createUserRecord(),
  createUserRecord({ id: SPONSOR, username: "sponsor", email: "sponsor@example.com" })
];

const seedCampaign = async () => {
  const harness = createCampaignHarness(users);
  const campaign = await harness.campaignService.createCampaign(
    OWNER,
    createCampaignInputSchema.parse({ name: "Lake Loop", location: "Nairobi", targetAmount: 500 })
  );
  return { ...harness, campaign };
};

test("CampaignService.createCampaign starts with empty totals and a slug from the name", async () => {
  const { campaign } = await seedCampaign();

  assert.equal(campaign.id, "00000001000000000000000000000000");
  assert.equal(campaign.slug, "lake-loop-00000001");
  assert.equal(campaign.activity, "Running");
  assert.equal(campaign.acceptTac, false);
  assert.equal(campaign.moneyRaised, 0);
  assert.equal(campaign.distanceCovered, 0);
  assert.deepEqual(campaign.members, []);
  assert.deepEqual(campaign.sponsors, []);
});

test("CampaignService.joinCampaign adds the member once", async () => {
  const { campaignService, campaign } = await seedCampaign();

  const joined = await campaignService.joinCampaign(RUNNER, campaign.slug);
  assert.deepEqual(joined.members, [RUNNER]);

  await assert.rejects(campaignService.joinCampaign(RUNNER, campaign.slug), (error: unknown) => {
    assert.ok(error instanceof BadRequestException);
    assert.equal(error.message, "You have already joined Lake Loop campaign.");
    return true;
  });
  await assert.rejects(campaignService.joinCampaign(RUNNER, "missing-00000000"), NotFoundException);
});

test("CampaignService.participateCampaign joins the campaign and opens an unfinished run", async () => {
  const { campaignService, campaign, repositories } = await seedCampaign();

  const runner = await campaignService.participateCampaign(RUNNER, campaign.slug, "Cycling");

  assert.equal(runner.id, "00000002000000000000000000000000");
  assert.equal(runner.campaignId, campaign.id);
  assert.equal(runner.ownerId, RUNNER);
  assert.equal(runner.activity, "Cycling");
  assert.equal(runner.distanceCovered, 0);
  assert.equal(runner.duration, "");

  await campaignService.participateCampaign(RUNNER, campaign.slug, "Running");

  assert.deepEqual((await campaignService.getCampaignBySlug(campaign.slug)).members, [RUNNER]);
  assert.equal(repositories.runners.runners.size, 2);
});

test("CampaignService.finishCampaignRun adds progress to the run and to the campaign totals", async () => {
  const { campaignService, campaign, clock } = await seedCampaign();
  const runner = await campaignService.participateCampaign(RUNNER, campaign.slug, "Running");
  clock.advance(60_000);

  const first = await campaignService.finishCampaignRun(RUNNER, campaign.slug, runner.id, {
    distanceCovered: 5,
    duration: "00:30:00",
    moneyRaised: 20
  });

  assert.equal(first.distanceCovered, 5);
  assert.equal(first.duration, "00:30:00");
  assert.equal(first.moneyRaised, 20);
  assert.equal(first.updatedAt.toISOString(), "2024-03-01T08:01:00.000Z");

  const second = await campaignService.finishCampaignRun(RUNNER, campaign.slug, runner.id, {
    distanceCovered: 2.5,
    duration: "00:45:00",
    moneyRaised: 0
  });

  assert.equal(second.distanceCovered, 7.5);
  assert.equal(second.duration, "00:45:00");
  assert.equal(second.moneyRaised, 20);

  const totals = await campaignService.getCampaignBySlug(campaign.slug);
  assert.equal(totals.distanceCovered, 7.5);
  assert.equal(totals.moneyRaised, 20);
});

test("CampaignService.finishCampaignRun only lets the runner finish their own run on that campaign", async () => {
  const { campaignService, campaign } = await seedCampaign();
  const other = await campaignService.createCampaign(SPONSOR, createCampaignInputSchema.parse({ name: "Hill Sprint" }));
  const runner = await campaignService.participateCampaign(RUNNER, campaign.slug, "Running");
  const progress = { distanceCovered: 3, duration: "00:20:00", moneyRaised: 0 };

  await assert.rejects(campaignService.finishCampaignRun(SPONSOR, campaign.slug, runner.id, progress), (error: unknown) => {
    assert.ok(error instanceof ForbiddenException);
    assert.equal(error.message, "Access denied to this runner.");
    return true;
  });
  await assert.rejects(campaignService.finishCampaignRun(RUNNER, other.slug, runner.id, progress), ForbiddenException);
  await assert.rejects(campaignService.finishCampaignRun(RUNNER, campaign.slug, "missing", progress), (error: unknown) => {
    assert.ok(error instanceof NotFoundException);
    assert.equal(error.message, "Campaign runner not found.");
    return true;
  });

  assert.equal((await campaignService.getCampaignBySlug(campaign.slug)).distanceCovered, 0);
});

test("CampaignService.getLeaderboard ranks finished runs with one entry per runner", async () => {
  const { campaignService, campaign } = await seedCampaign();
  const finish = async (ownerId: string, distanceCovered: number) => {
    const runner = await campaignService.participateCampaign(ownerId, campaign.slug, "Running");
    return campaignService.finishCampaignRun(ownerId, campaign.slug, runner.id, {
      distanceCovered,
      duration: "00:30:00",
      moneyRaised: 0
    });
  };

  await finish(RUNNER, 4);
  await finish("user-two", 9);
  await finish(RUNNER, 6);
  await campaignService.participateCampaign("user-three", campaign.slug, "Walking");

  const board = await campaignService.getLeaderboard(campaign.slug);
  assert.deepEqual(
    board.map((runner) => [runner.ownerId, runner.distanceCovered]),
    [
      ["user-two", 9],
      [RUNNER, 6]
    ]
  );

  const top = await campaignService.getLeaderboard(campaign.slug, 1);
  assert.deepEqual(
    top.map((runner) => runner.ownerId),
    ["user-two"]
  );
  await assert.rejects(campaignService.getLeaderboard("missing-00000000"), NotFoundException);
});

test("CampaignService.sponsorCampaign stores the pledge total and raises the campaign money", async () => {
  const { campaignService, campaign } = await seedCampaign();

  const first = await campaignService.sponsorCampaign(
    SPONSOR,
    campaign.slug,
    sponsorCampaignInputSchema.parse({ distance: 10, amountPerKm: 2.5 })
  );
  await campaignService.sponsorCampaign(
    SPONSOR,
    campaign.slug,
    sponsorCampaignInputSchema.parse({ distance: 4, amountPerKm: 1.5 })
  );

  assert.equal(first.campaignId, campaign.id);
  assert.equal(first.totalAmount, 25);

  const updated = await campaignService.getCampaignBySlug(campaign.slug);
  assert.equal(updated.moneyRaised, 31);
  assert.deepEqual(updated.sponsors, [SPONSOR]);

  const sponsors = await campaignService.listCampaignSponsors(campaign.slug);
  assert.deepEqual(
    sponsors.map((pledge) => pledge.totalAmount),
    [25, 6]
  );
});

test("CampaignService.updateCampaign keeps the slug and is limited to the owner", async () => {
  const { campaignService, campaign } = await seedCampaign();

  await assert.rejects(campaignService.updateCampaign(RUNNER, campaign.slug, { name: "Taken" }), (error: unknown) => {
    assert.ok(error instanceof ForbiddenException);
    assert.equal(error.message, "Only the campaign owner can change it.");
    return true;
  });

  const updated = await campaignService.updateCampaign(OWNER, campaign.slug, { name: "Lake Loop Night", acceptTac: true });
  assert.equal(updated.name, "Lake Loop Night");
  assert.equal(updated.slug, "lake-loop-00000001");
  assert.equal(updated.acceptTac, true);

  await assert.rejects(campaignService.deleteCampaign(RUNNER, campaign.slug), ForbiddenException);
  await campaignService.deleteCampaign(OWNER, campaign.slug);
  await assert.rejects(campaignService.getCampaignBySlug(campaign.slug), NotFoundException);
});

test("CampaignService list queries search text and split by owner", async () => {
  const { campaignService, clock } = await seedCampaign();
  clock.advance(1_000);
  await campaignService.createCampaign(
    RUNNER,
    createCampaignInputSchema.parse({ name: "Hill Sprint", description: "Steep climbs near the lake" })
  );
  clock.advance(1_000);
  await campaignService.createCampaign(OWNER, createCampaignInputSchema.parse({ name: "City Ride", location: "Mombasa" }));

  const found = await campaignService.searchCampaigns({ q: "lake", page: 1, limit: 10 });
  assert.deepEqual(
    found.items.map((campaign) => campaign.name),
    ["Hill Sprint", "Lake Loop"]
  );

  const others = await campaignService.listCampaignsByOthers(OWNER, { page: 1, limit: 10 });
  assert.deepEqual(
    others.items.map((campaign) => campaign.name),
    ["Hill Sprint"]
  );

  const own = await campaignService.listCampaignsByOwner(OWNER);
  assert.deepEqual(
    own.map((campaign) => campaign.name),
    ["City Ride", "Lake Loop"]
  );
});

test("CampaignService.createRunner settles the given progress for an existing user", async () => {
  const { campaignService, campaign } = await seedCampaign();

  const runner = await campaignService.createRunner(
    createCampaignRunnerInputSchema.parse({
      campaignId: campaign.id,
      userId: RUNNER,
      activity: "Walking",
      distanceCovered: 3,
      duration: "00:25:00",
      moneyRaised: 12
    })
  );

  assert.equal(runner.distanceCovered, 3);
  assert.equal(runner.moneyRaised, 12);
  assert.equal(runner.duration, "00:25:00");

  const open = await campaignService.createRunner(
    createCampaignRunnerInputSchema.parse({ campaignId: campaign.id, userId: OWNER, activity: "Running" })
  );
  assert.equal(open.duration, "");

  const totals = await campaignService.getCampaignById(campaign.id);
  assert.equal(totals.distanceCovered, 3);
  assert.equal(totals.moneyRaised, 12);
  assert.deepEqual(totals.members, [RUNNER, OWNER]);

  const page = await campaignService.listRunners({ page: 1, limit: 10, userId: RUNNER });
  assert.deepEqual(
    page.items.map((item) => item.id),
    [runner.id]
  );

  await assert.rejects(
    campaignService.createRunner(
      createCampaignRunnerInputSchema.parse({ campaignId: campaign.id, userId: "user-missing", activity: "Running" })
    ),
    NotFoundException
  );
});

test("CampaignService.updateSponsorship recomputes the pledge total without rewriting the campaign", async () => {
  const { campaignService, campaign } = await seedCampaign();
  const pledge = await campaignService.createSponsorship(
    createSponsorCampaignInputSchema.parse({ campaignId: campaign.id, sponsorId: SPONSOR, distance: 10, amountPerKm: 2 })
  );

  const updated = await campaignService.updateSponsorship(pledge.id, { amountPerKm: 3 });

  assert.equal(updated.distance, 10);
  assert.equal(updated.totalAmount, 30);
  assert.equal((await campaignService.getCampaignById(campaign.id)).moneyRaised, 20);

  await campaignService.deleteSponsorship(pledge.id);
  await assert.rejects(campaignService.getSponsorshipById(pledge.id), (error: unknown) => {
    assert.ok(error instanceof NotFoundException);
    assert.equal(error.message, "Sponsorship not found.");
    return true;
  });
  await assert.rejects(
    campaignService.createSponsorship(
      createSponsorCampaignInputSchema.parse({ campaignId: campaign.id, sponsorId: "user-missing", distance: 1, amountPerKm: 1 })
    ),
    NotFoundException
  );
});
