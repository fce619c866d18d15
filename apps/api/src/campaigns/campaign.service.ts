import { BadRequestException, ForbiddenException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import { SpanStatusCode } from "@opentelemetry/api";
import type {
  Activity,
  CampaignRunnerListQuery,
  CampaignSearchQuery,
  CreateCampaignInput,
  CreateCampaignRunnerInput,
  CreateSponsorCampaignInput,
  FinishCampaignRunInput,
  Page,
  Pagination,
  SponsorCampaignInput,
  SponsorCampaignListQuery,
  UpdateCampaignInput,
  UpdateCampaignRunnerInput,
  UpdateSponsorCampaignInput
} from "@runfund/types";
import { rankLeaderboard } from "../challenges/leaderboard";
import { computePledgeTotal } from "../challenges/pledge";
import { CLOCK, ID_GENERATOR, type Clock, type IdGenerator } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { assertOwnership, omitUndefined } from "../common/records";
import { createSlug } from "../common/slug";
import { createModuleLogger } from "../observability/logger";
import { apiTracer, campaignRunDistanceHistogram, pledgeAmountHistogram, pledgeCounter } from "../observability/telemetry";
import { UserService } from "../users/user.service";
import {
  CAMPAIGN_REPOSITORY,
  CAMPAIGN_RUNNER_REPOSITORY,
  SPONSOR_CAMPAIGN_REPOSITORY,
  type CampaignRepository,
  type CampaignRunnerRepository,
  type SponsorCampaignRepository
} from "./campaign.repositories";
import type { CampaignRecord, CampaignRunnerRecord, SponsorCampaignRecord } from "./campaign.types";

type RunProgress = Pick<FinishCampaignRunInput, "distanceCovered" | "duration" | "moneyRaised">;

@Injectable()
export class CampaignService {
  private readonly logger = createModuleLogger("CampaignService");

  constructor(
    @Inject(CAMPAIGN_REPOSITORY) private readonly campaigns: CampaignRepository,
    @Inject(CAMPAIGN_RUNNER_REPOSITORY) private readonly runners: CampaignRunnerRepository,
    @Inject(SPONSOR_CAMPAIGN_REPOSITORY) private readonly pledges: SponsorCampaignRepository,
    @Inject(UserService) private readonly userService: UserService,
    @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async createCampaign(ownerId: string, input: CreateCampaignInput): Promise<CampaignRecord> {
    const id = this.generateId();
    const now = this.clock();

    const campaign = await this.campaigns.create({
      ...input,
      id,
      ownerId,
      acceptTac: false,
      moneyRaised: 0,
      distanceCovered: 0,
      slug: createSlug(input.name, id),
      members: [],
      sponsors: [],
      createdAt: now,
      updatedAt: now
    });

    this.logger.info({ event: "campaign.created", campaignId: id, ownerId }, "Campaign created");

    return campaign;
  }

  async getCampaignById(id: string): Promise<CampaignRecord> {
    const campaign = await this.campaigns.findById(id);

    if (!campaign) {
      throw new NotFoundException("Campaign not found.");
    }

    return campaign;
  }

  async getCampaignBySlug(slug: string): Promise<CampaignRecord> {
    const campaign = await this.campaigns.findBySlug(slug);

    if (!campaign) {
      throw new NotFoundException("Campaign not found.");
    }

    return campaign;
  }

  async listCampaigns(pagination: Pagination): Promise<Page<CampaignRecord>> {
    const campaigns = await this.campaigns.list(toRange(pagination));
    return toPage(campaigns, pagination);
  }

  async searchCampaigns(query: CampaignSearchQuery): Promise<Page<CampaignRecord>> {
    const campaigns = await this.campaigns.list({ ...toRange(query), search: query.q });
    return toPage(campaigns, query);
  }

  listCampaignsByOwner(ownerId: string): Promise<CampaignRecord[]> {
    return this.campaigns.listByOwner(ownerId);
  }

  async listCampaignsByOthers(userId: string, pagination: Pagination): Promise<Page<CampaignRecord>> {
    const campaigns = await this.campaigns.list({ ...toRange(pagination), excludeOwnerId: userId });
    return toPage(campaigns, pagination);
  }

  /** The slug stays as created. */
  async updateCampaign(actorId: string, slug: string, input: UpdateCampaignInput): Promise<CampaignRecord> {
    const campaign = await this.getCampaignBySlug(slug);
    assertOwnership(actorId, campaign.ownerId, "Only the campaign owner can change it.");

    const updated = await this.campaigns.update(campaign.id, { ...omitUndefined(input), updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Campaign not found.");
    }

    return updated;
  }

  async deleteCampaign(actorId: string, slug: string): Promise<void> {
    const campaign = await this.getCampaignBySlug(slug);
    assertOwnership(actorId, campaign.ownerId, "Only the campaign owner can delete it.");

    if (!(await this.campaigns.delete(campaign.id))) {
      throw new NotFoundException("Campaign not found.");
    }

    this.logger.info({ event: "campaign.deleted", campaignId: campaign.id }, "Campaign deleted");
  }

  async joinCampaign(userId: string, slug: string): Promise<CampaignRecord> {
    const campaign = await this.getCampaignBySlug(slug);

    if (campaign.members.includes(userId)) {
      throw new BadRequestException(`You have already joined ${campaign.name} campaign.`);
    }

    return this.addMember(campaign, userId);
  }

  /** Joins the campaign when needed and opens an unfinished run. */
  async participateCampaign(userId: string, slug: string, activity: Activity): Promise<CampaignRunnerRecord> {
    return this.openRun(await this.getCampaignBySlug(slug), userId, activity);
  }

  async getOwnRun(actorId: string, slug: string, runnerId: string): Promise<CampaignRunnerRecord> {
    const campaign = await this.getCampaignBySlug(slug);
    const runner = await this.getRunnerById(runnerId);

    if (runner.campaignId !== campaign.id || runner.ownerId !== actorId) {
      throw new ForbiddenException("Access denied to this runner.");
    }

    return runner;
  }

  async finishCampaignRun(
    actorId: string,
    slug: string,
    runnerId: string,
    input: FinishCampaignRunInput
  ): Promise<CampaignRunnerRecord> {
    return this.settleRun(await this.getOwnRun(actorId, slug, runnerId), input);
  }

  async getLeaderboard(slug: string, limit?: number): Promise<CampaignRunnerRecord[]> {
    const campaign = await this.getCampaignBySlug(slug);
    const ranked = rankLeaderboard(await this.runners.list({ campaignId: campaign.id }));
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  async sponsorCampaign(sponsorId: string, slug: string, input: SponsorCampaignInput): Promise<SponsorCampaignRecord> {
    return this.pledge(await this.getCampaignBySlug(slug), sponsorId, input);
  }

  async listCampaignSponsors(slug: string): Promise<SponsorCampaignRecord[]> {
    const campaign = await this.getCampaignBySlug(slug);
    return this.pledges.findByTargetId(campaign.id);
  }

  /** Opens a run for any user and settles the given progress right away. */
  async createRunner(input: CreateCampaignRunnerInput): Promise<CampaignRunnerRecord> {
    const campaign = await this.getCampaignById(input.campaignId);
    await this.userService.getUserById(input.userId);

    const runner = await this.openRun(campaign, input.userId, input.activity);

    if (input.distanceCovered > 0 || input.moneyRaised > 0 || input.duration !== "") {
      return this.settleRun(runner, input);
    }

    return runner;
  }

  async listRunners(query: CampaignRunnerListQuery): Promise<Page<CampaignRunnerRecord>> {
    const runners = await this.runners.list({ campaignId: query.campaignId, ownerId: query.userId }, toRange(query));
    return toPage(runners, query);
  }

  async getRunnerById(id: string): Promise<CampaignRunnerRecord> {
    const runner = await this.runners.findById(id);

    if (!runner) {
      throw new NotFoundException("Campaign runner not found.");
    }

    return runner;
  }

  /** Corrects a run in place; campaign totals are left as recorded. */
  async updateRunner(id: string, input: UpdateCampaignRunnerInput): Promise<CampaignRunnerRecord> {
    const updated = await this.runners.update(id, { ...omitUndefined(input), updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Campaign runner not found.");
    }

    return updated;
  }

  async deleteRunner(id: string): Promise<void> {
    if (!(await this.runners.delete(id))) {
      throw new NotFoundException("Campaign runner not found.");
    }
  }

  async createSponsorship(input: CreateSponsorCampaignInput): Promise<SponsorCampaignRecord> {
    const campaign = await this.getCampaignById(input.campaignId);
    await this.userService.getUserById(input.sponsorId);

    return this.pledge(campaign, input.sponsorId, input);
  }

  async listSponsorships(query: SponsorCampaignListQuery): Promise<Page<SponsorCampaignRecord>> {
    const pledges = await this.pledges.list(query.campaignId, toRange(query));
    return toPage(pledges, query);
  }

  async getSponsorshipById(id: string): Promise<SponsorCampaignRecord> {
    const pledge = await this.pledges.findById(id);

    if (!pledge) {
      throw new NotFoundException("Sponsorship not found.");
    }

    return pledge;
  }

  /** Recomputes the pledge total; the campaign's money raised is not rewritten. */
  async updateSponsorship(id: string, input: UpdateSponsorCampaignInput): Promise<SponsorCampaignRecord> {
    const pledge = await this.getSponsorshipById(id);
    const totalAmount = computePledgeTotal(input.distance ?? pledge.distance, input.amountPerKm ?? pledge.amountPerKm);

    const updated = await this.pledges.update(id, { ...omitUndefined(input), totalAmount, updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Sponsorship not found.");
    }

    return updated;
  }

  async deleteSponsorship(id: string): Promise<void> {
    if (!(await this.pledges.delete(id))) {
      throw new NotFoundException("Sponsorship not found.");
    }
  }

  private async addMember(campaign: CampaignRecord, userId: string): Promise<CampaignRecord> {
    const updated = await this.campaigns.addMember(campaign.id, userId, this.clock());

    if (!updated) {
      throw new NotFoundException("Campaign not found.");
    }

    return updated;
  }

  private async openRun(campaign: CampaignRecord, userId: string, activity: Activity): Promise<CampaignRunnerRecord> {
    await this.addMember(campaign, userId);

    const now = this.clock();
    const runner = await this.runners.create({
      id: this.generateId(),
      campaignId: campaign.id,
      ownerId: userId,
      distanceCovered: 0,
      duration: "",
      moneyRaised: 0,
      coverImage: "",
      activity,
      dateJoined: now,
      createdAt: now,
      updatedAt: now
    });

    this.logger.info(
      { event: "campaign.run_started", campaignId: campaign.id, runnerId: runner.id, ownerId: userId },
      "Campaign run started"
    );

    return runner;
  }

  /**
   * Adds the progress to the run, then to the campaign totals. Both writes
   * are atomic increments; a run whose campaign has gone stays updated.
   */
  private async settleRun(runner: CampaignRunnerRecord, progress: RunProgress): Promise<CampaignRunnerRecord> {
    const span = apiTracer.startSpan("campaigns.finish_run", {
      attributes: { campaignId: runner.campaignId, distanceCovered: progress.distanceCovered }
    });

    try {
      const now = this.clock();
      const updated = await this.runners.recordProgress(runner.id, progress, now);

      if (!updated) {
        throw new NotFoundException("Campaign runner not found.");
      }

      const campaign = await this.campaigns.incrementProgress(
        runner.campaignId,
        { distanceCovered: progress.distanceCovered, moneyRaised: progress.moneyRaised },
        now
      );

      if (!campaign) {
        this.logger.warn(
          { event: "campaign.run_orphaned", campaignId: runner.campaignId, runnerId: runner.id },
          "Run finished for a campaign that no longer exists"
        );
        throw new NotFoundException("Campaign not found.");
      }

      campaignRunDistanceHistogram.record(progress.distanceCovered, { activity: runner.activity });
      span.setStatus({ code: SpanStatusCode.OK });
      this.logger.info(
        {
          event: "campaign.run_finished",
          campaignId: campaign.id,
          runnerId: runner.id,
          distanceCovered: progress.distanceCovered,
          moneyRaised: progress.moneyRaised,
          campaignDistanceCovered: campaign.distanceCovered
        },
        "Campaign run finished"
      );

      return updated;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      }
      throw error;
    } finally {
      span.end();
    }
  }

  private async pledge(
    campaign: CampaignRecord,
    sponsorId: string,
    input: SponsorCampaignInput
  ): Promise<SponsorCampaignRecord> {
    const now = this.clock();
    const pledge = await this.pledges.create({
      id: this.generateId(),
      campaignId: campaign.id,
      sponsorId,
      distance: input.distance,
      amountPerKm: input.amountPerKm,
      totalAmount: computePledgeTotal(input.distance, input.amountPerKm),
      brandImg: input.brandImg,
      videoUrl: input.videoUrl,
      createdAt: now,
      updatedAt: now
    });

    if (!(await this.campaigns.addSponsorship(campaign.id, sponsorId, pledge.totalAmount, now))) {
      throw new NotFoundException("Campaign not found.");
    }

    pledgeCounter.add(1, { target: "campaign" });
    pledgeAmountHistogram.record(pledge.totalAmount, { target: "campaign" });
    this.logger.info(
      { event: "sponsorship.pledged", target: "campaign", pledgeId: pledge.id, sponsorId, totalAmount: pledge.totalAmount },
      "Sponsor pledge saved"
    );

    return pledge;
  }
}
