import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post } from "@nestjs/common";
import {
  buyCauseInputSchema,
  createCauseInputSchema,
  recordActivityInputSchema,
  sponsorCauseInputSchema,
  updateCauseInputSchema,
  updatePledgeInputSchema,
  type AuthUser,
  type Cause,
  type CauseBuyer,
  type CauseRunner,
  type RecordActivityResult,
  type SponsorCause
} from "@runfund/types";
import { AllowAnonymous, CurrentUser } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { UserService } from "../users/user.service";
import { ChallengeService } from "./challenge.service";
import type { CauseRecord } from "./challenge.types";
import { toCauseBuyerView, toCauseRunnerView, toCauseView, toSponsorCauseView } from "./challenge.views";

@Controller("api/causes")
export class CausesController {
  constructor(
    @Inject(ChallengeService) private readonly challengeService: ChallengeService,
    @Inject(UserService) private readonly userService: UserService
  ) {}

  @Get("slug/:slug")
  @AllowAnonymous()
  async getBySlug(@Param("slug") slug: string): Promise<Cause> {
    return this.withOwner(await this.challengeService.getCauseBySlug(slug));
  }

  @Get(":id")
  @AllowAnonymous()
  async getById(@Param("id") id: string): Promise<Cause> {
    return this.withOwner(await this.challengeService.getCauseById(id));
  }

  @Get(":id/runners")
  @AllowAnonymous()
  async listRunners(@Param("id") id: string): Promise<CauseRunner[]> {
    const runners = await this.challengeService.listCauseRunners(id);
    return runners.map(toCauseRunnerView);
  }

  @Get(":id/sponsors")
  @AllowAnonymous()
  async listSponsors(@Param("id") id: string): Promise<SponsorCause[]> {
    const pledges = await this.challengeService.listCauseSponsors(id);
    return pledges.map(toSponsorCauseView);
  }

  @Get(":id/purchases")
  @AllowAnonymous()
  async listPurchases(@Param("id") id: string): Promise<CauseBuyer[]> {
    const purchases = await this.challengeService.listCausePurchases(id);
    return purchases.map(toCauseBuyerView);
  }

  @Post()
  @HttpCode(201)
  async create(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<Cause> {
    const input = parseInput(createCauseInputSchema, body);
    return this.withOwner(await this.challengeService.createCause(caller.id, input));
  }

  @Post("activity")
  @HttpCode(201)
  async recordActivity(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<RecordActivityResult> {
    const input = parseInput(recordActivityInputSchema, body);
    const runner = await this.challengeService.recordCauseActivity(caller.id, input);
    return { message: "Activity recorded successfully", runner: toCauseRunnerView(runner) };
  }

  @Post("sponsor")
  @HttpCode(201)
  async sponsor(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<SponsorCause> {
    const input = parseInput(sponsorCauseInputSchema, body);
    return toSponsorCauseView(await this.challengeService.sponsorCause(caller.id, input));
  }

  @Patch("sponsors/:pledgeId")
  async updatePledge(
    @CurrentUser() caller: AuthUser,
    @Param("pledgeId") pledgeId: string,
    @Body() body: unknown
  ): Promise<SponsorCause> {
    const input = parseInput(updatePledgeInputSchema, body);
    return toSponsorCauseView(await this.challengeService.updateCausePledge(caller.id, pledgeId, input));
  }

  @Post("buy")
  @HttpCode(201)
  async buy(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<CauseBuyer> {
    const input = parseInput(buyCauseInputSchema, body);
    return toCauseBuyerView(await this.challengeService.buyCause(caller.id, input));
  }

  @Patch(":id")
  async update(@CurrentUser() caller: AuthUser, @Param("id") id: string, @Body() body: unknown): Promise<Cause> {
    const input = parseInput(updateCauseInputSchema, body);
    return this.withOwner(await this.challengeService.updateCause(caller.id, id, input));
  }

  @Delete(":id")
  @HttpCode(204)
  async remove(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<void> {
    await this.challengeService.deleteCause(caller.id, id);
  }

  @Post(":id/join")
  @HttpCode(200)
  async join(@CurrentUser() caller: AuthUser, @Param("id") id: string): Promise<Cause> {
    return this.withOwner(await this.challengeService.joinCause(caller.id, id));
  }

  private async withOwner(cause: CauseRecord): Promise<Cause> {
    const users = await this.userService.getUsersByIds([cause.ownerId]);
    return toCauseView(cause, users);
  }
}
