import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  createChallengeInputSchema,
  leaderboardQuerySchema,
  paginationSchema,
  sponsorChallengeInputSchema,
  updateChallengeInputSchema,
  updatePledgeInputSchema,
  type AuthUser,
  type Cause,
  type Challenge,
  type LeaderboardEntry,
  type Page,
  type SponsorChallenge
} from "@runfund/types";
import { AllowAnonymous, CurrentUser } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { ApiConfigService } from "../config/api.config";
import { UserService } from "../users/user.service";
import { ChallengeService } from "./challenge.service";
import type { CauseRecord, ChallengeRecord } from "./challenge.types";
import { toCauseRunnerView, toCauseView, toChallengeView, toSponsorChallengeView } from "./challenge.views";

@Controller("api/challenges")
export class ChallengesController {
  constructor(
    @Inject(ChallengeService) private readonly challengeService: ChallengeService,
    @Inject(UserService) private readonly userService: UserService,
    @Inject(ApiConfigService) private readonly config: ApiConfigService
  ) {}

  @Get()
  @AllowAnonymous()
  async list(@Query() query: unknown): Promise<Page<Challenge>> {
    const page = await this.challengeService.listChallenges(parseInput(paginationSchema, query));
    return { ...page, items: await this.withOwners(page.items) };
  }

  /**
   * Ranked runners joined with their usernames; runners whose account no
   * longer exists are left out.
   */
  @Get("leaderboard")
  @AllowAnonymous()
  async leaderboard(@Query() query: unknown): Promise<LeaderboardEntry[]> {
    const { causeId, limit } = parseInput(leaderboardQuerySchema, query);
    const runners = await this.challengeService.getLeaderboard({
      causeId,
      limit: limit ?? this.config.getLeaderboardSize()
    });
    const users = await this.userService.getUsersByIds(runners.map((runner) => runner.ownerId));

    return runners
      .flatMap((runner) => {
        const user = users.get(runner.ownerId);
        return user ? [{ ...toCauseRunnerView(runner), username: user.username }] : [];
      })
      .map((entry, index) => ({ ...entry, rank: index + 1 }));
  }

  @Get("slug/:slug")
  @AllowAnonymous()
  async getBySlug(@Param("slug") slug: string): Promise<Challenge> {
    return this.withOwner(await this.challengeService.getChallengeBySlug(slug));
  }

  @Get("id/:id")
  @AllowAnonymous()
  async getById(@Param("id") id: string): Promise<Challenge> {
    return this.withOwner(await this.challengeService.getChallengeById(id));
  }

  @Get(":id/causes")
  @AllowAnonymous()
  async listCauses(@Param("id") id: string): Promise<Cause[]> {
    const causes = await this.challengeService.listCausesByChallenge(id);
    return this.withCauseOwners(causes);
  }

  @Get(":id/sponsors")
  @AllowAnonymous()
  async listSponsors(@Param("id") id: string): Promise<SponsorChallenge[]> {
    const pledges = await this.challengeService.listChallengeSponsors(id);
    return pledges.map(toSponsorChallengeView);
  }

  @Post()
  @HttpCode(201)
  async create(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<Challenge> {
    const input = parseInput(createChallengeInputSchema, body);
    return this.withOwner(await this.challengeService.createChallenge(caller.id, input));
  }

  @Post("sponsor")
  @HttpCode(201)
  async sponsor(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<SponsorChallenge> {
    const input = parseInput(sponsorChallengeInputSchema, body);
    return toSponsorChallengeView(await this.challengeService.sponsorChallenge(caller.id, input));
  }

  @Patch("sponsors/:pledgeId")
  async updatePledge(
    @CurrentUser() caller: AuthUser,
    @Param("pledgeId") pledgeId: string,
    @Body() body: unknown
  ): Promise<SponsorChallenge> {
    const input = parseInput(updatePledgeInputSchema, body);
    return toSponsorChallengeView(await this.challengeService.updateChallengePledge(caller.id, pledgeId, input));
  }

  @Patch(":id")
  async update(@CurrentUser() caller: AuthUser, @Param("id") id: string, @Body() body: unknown): Promise<Challenge> {
    const input = parseInput(updateChallengeInputSchema, body);
    return this.withOwner(await this.challengeService.updateChallenge(caller.id, id, input));
  }

  @Delete(":id")
  @HttpCode(204)
  async remove(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<void> {
    await this.challengeService.deleteChallenge(caller.id, id);
  }

  @Post(":id/join")
  @HttpCode(200)
  async join(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<Challenge> {
    return this.withOwner(await this.challengeService.joinChallenge(caller.id, id));
  }

  private async withOwner(challenge: ChallengeRecord): Promise<Challenge> {
    const users = await this.userService.getUsersByIds([challenge.ownerId]);
    return toChallengeView(challenge, users);
  }

  private async withOwners(challenges: ChallengeRecord[]): Promise<Challenge[]> {
    const users = await this.userService.getUsersByIds(challenges.map((challenge) => challenge.ownerId));
    return challenges.map((challenge) => toChallengeView(challenge, users));
  }

  private async withCauseOwners(causes: CauseRecord[]): Promise<Cause[]> {
    const users = await this.userService.getUsersByIds(causes.map((cause) => cause.ownerId));
    return causes.map((cause) => toCauseView(cause, users));
  }
}
