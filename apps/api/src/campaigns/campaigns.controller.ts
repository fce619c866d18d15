import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  campaignLeaderboardQuerySchema,
  campaignSearchQuerySchema,
  createCampaignInputSchema,
  finishCampaignRunInputSchema,
  paginationSchema,
  participateCampaignInputSchema,
  sponsorCampaignInputSchema,
  updateCampaignInputSchema,
  type AuthUser,
  type Campaign,
  type CampaignLeaderboardEntry,
  type CampaignRunner,
  type Page,
  type ParticipateCampaignResult,
  type SponsorCampaign
} from "@runfund/types";
import { AllowAnonymous, CurrentUser } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { ApiConfigService } from "../config/api.config";
import { UserService } from "../users/user.service";
import { CampaignService } from "./campaign.service";
import type { CampaignRecord } from "./campaign.types";
import { toCampaignRunnerView, toCampaignView, toSponsorCampaignView } from "./campaign.views";

@Controller("api/campaigns")
export class CampaignsController {
  constructor(
    @Inject(CampaignService) private readonly campaignService: CampaignService,
    @Inject(UserService) private readonly userService: UserService,
    @Inject(ApiConfigService) private readonly config: ApiConfigService
  ) {}

  @Get()
  @AllowAnonymous()
  async list(@Query() query: unknown): Promise<Page<Campaign>> {
    const page = await this.campaignService.listCampaigns(parseInput(paginationSchema, query));
    return { ...page, items: await this.withOwners(page.items) };
  }

  @Get("search")
  @AllowAnonymous()
  async search(@Query() query: unknown): Promise<Page<Campaign>> {
    const page = await this.campaignService.searchCampaigns(parseInput(campaignSearchQuerySchema, query));
    return { ...page, items: await this.withOwners(page.items) };
  }

  @Get("by-user")
  async listMine(@CurrentUser() caller: AuthUser): Promise<Campaign[]> {
    return this.withOwners(await this.campaignService.listCampaignsByOwner(caller.id));
  }

  @Get("by-others")
  async listOthers(@CurrentUser() caller: AuthUser, @Query() query: unknown): Promise<Page<Campaign>> {
    const page = await this.campaignService.listCampaignsByOthers(caller.id, parseInput(paginationSchema, query));
    return { ...page, items: await this.withOwners(page.items) };
  }

  @Get(":slug")
  @AllowAnonymous()
  async getBySlug(@Param("slug") slug: string): Promise<Campaign> {
    return this.withOwner(await this.campaignService.getCampaignBySlug(slug));
  }

  @Post()
  @HttpCode(201)
  async create(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<Campaign> {
    const input = parseInput(createCampaignInputSchema, body);
    return this.withOwner(await this.campaignService.createCampaign(caller.id, input));
  }

  @Patch(":slug")
  async update(@CurrentUser() caller: AuthUser, @Param("slug") slug: string, @Body() body: unknown): Promise<Campaign> {
    const input = parseInput(updateCampaignInputSchema, body);
    return this.withOwner(await this.campaignService.updateCampaign(caller.id, slug, input));
  }

  @Delete(":slug")
  @HttpCode(204)
  async remove(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<void> {
    await this.campaignService.deleteCampaign(caller.id, slug);
  }

  @Post(":slug/join")
  @HttpCode(200)
  async join(@CurrentUser() caller: AuthUser, @Param("slug") slug: string): Promise<Campaign> {
    return this.withOwner(await this.campaignService.joinCampaign(caller.id, slug));
  }

  @Post(":slug/participate")
  @HttpCode(201)
  async participate(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Body() body: unknown
  ): Promise<ParticipateCampaignResult> {
    const { activity } = parseInput(participateCampaignInputSchema, body);
    const runner = await this.campaignService.participateCampaign(caller.id, slug, activity);
    return { message: `${activity} started`, runner: toCampaignRunnerView(runner) };
  }

  @Get(":slug/finish/:runnerId")
  async getRun(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Param("runnerId") runnerId: string
  ): Promise<CampaignRunner> {
    return toCampaignRunnerView(await this.campaignService.getOwnRun(caller.id, slug, runnerId));
  }

  @Patch(":slug/finish/:runnerId")
  async finishRun(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Param("runnerId") runnerId: string,
    @Body() body: unknown
  ): Promise<CampaignRunner> {
    const input = parseInput(finishCampaignRunInputSchema, body);
    return toCampaignRunnerView(await this.campaignService.finishCampaignRun(caller.id, slug, runnerId, input));
  }

  @Post(":slug/sponsor")
  @HttpCode(201)
  async sponsor(
    @CurrentUser() caller: AuthUser,
    @Param("slug") slug: string,
    @Body() body: unknown
  ): Promise<SponsorCampaign> {
    const input = parseInput(sponsorCampaignInputSchema, body);
    return toSponsorCampaignView(await this.campaignService.sponsorCampaign(caller.id, slug, input));
  }

  @Get(":slug/sponsors")
  @AllowAnonymous()
  async listSponsors(@Param("slug") slug: string): Promise<SponsorCampaign[]> {
    const pledges = await this.campaignService.listCampaignSponsors(slug);
    return pledges.map(toSponsorCampaignView);
  }

  /** Finished runs only, one per runner; runners without an account are left out. */
  @Get(":slug/leaderboard")
  @AllowAnonymous()
  async leaderboard(@Param("slug") slug: string, @Query() query: unknown): Promise<CampaignLeaderboardEntry[]> {
    const { limit } = parseInput(campaignLeaderboardQuerySchema, query);
    const runners = await this.campaignService.getLeaderboard(slug, limit ?? this.config.getLeaderboardSize());
    const users = await this.userService.getUsersByIds(runners.map((runner) => runner.ownerId));

    return runners
      .flatMap((runner) => {
        const user = users.get(runner.ownerId);
        return user ? [{ ...toCampaignRunnerView(runner), username: user.username }] : [];
      })
      .map((entry, index) => ({ ...entry, rank: index + 1 }));
  }

  private async withOwner(campaign: CampaignRecord): Promise<Campaign> {
    const users = await this.userService.getUsersByIds([campaign.ownerId]);
    return toCampaignView(campaign, users);
  }

  private async withOwners(campaigns: CampaignRecord[]): Promise<Campaign[]> {
    const users = await this.userService.getUsersByIds(campaigns.map((campaign) => campaign.ownerId));
    return campaigns.map((campaign) => toCampaignView(campaign, users));
  }
}
