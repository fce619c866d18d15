import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  campaignRunnerListQuerySchema,
  createCampaignRunnerInputSchema,
  createSponsorCampaignInputSchema,
  sponsorCampaignListQuerySchema,
  updateCampaignRunnerInputSchema,
  updateSponsorCampaignInputSchema,
  type CampaignRunner,
  type Page,
  type SponsorCampaign
} from "@runfund/types";
import { StaffOnly } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { CampaignService } from "./campaign.service";
import { toCampaignRunnerView, toSponsorCampaignView } from "./campaign.views";

@Controller("api/admin")
@StaffOnly()
export class CampaignAdminController {
  constructor(@Inject(CampaignService) private readonly campaignService: CampaignService) {}

  @Post("campaign-runners")
  @HttpCode(201)
  async createRunner(@Body() body: unknown): Promise<CampaignRunner> {
    const input = parseInput(createCampaignRunnerInputSchema, body);
    return toCampaignRunnerView(await this.campaignService.createRunner(input));
  }

  @Get("campaign-runners")
  async listRunners(@Query() query: unknown): Promise<Page<CampaignRunner>> {
    const page = await this.campaignService.listRunners(parseInput(campaignRunnerListQuerySchema, query));
    return { ...page, items: page.items.map(toCampaignRunnerView) };
  }

  @Get("campaign-runners/:id")
  async getRunner(@Param("id") id: string): Promise<CampaignRunner> {
    return toCampaignRunnerView(await this.campaignService.getRunnerById(id));
  }

  @Patch("campaign-runners/:id")
  async updateRunner(@Param("id") id: string, @Body() body: unknown): Promise<CampaignRunner> {
    const input = parseInput(updateCampaignRunnerInputSchema, body);
    return toCampaignRunnerView(await this.campaignService.updateRunner(id, input));
  }

  @Delete("campaign-runners/:id")
  @HttpCode(204)
  async deleteRunner(@Param("id") id: string): Promise<void> {
    await this.campaignService.deleteRunner(id);
  }

  @Post("sponsor-campaigns")
  @HttpCode(201)
  async createSponsorship(@Body() body: unknown): Promise<SponsorCampaign> {
    const input = parseInput(createSponsorCampaignInputSchema, body);
    return toSponsorCampaignView(await this.campaignService.createSponsorship(input));
  }

  @Get("sponsor-campaigns")
  async listSponsorships(@Query() query: unknown): Promise<Page<SponsorCampaign>> {
    const page = await this.campaignService.listSponsorships(parseInput(sponsorCampaignListQuerySchema, query));
    return { ...page, items: page.items.map(toSponsorCampaignView) };
  }

  @Get("sponsor-campaigns/:id")
  async getSponsorship(@Param("id") id: string): Promise<SponsorCampaign> {
    return toSponsorCampaignView(await this.campaignService.getSponsorshipById(id));
  }

  @Patch("sponsor-campaigns/:id")
  async updateSponsorship(@Param("id") id: string, @Body() body: unknown): Promise<SponsorCampaign> {
    const input = parseInput(updateSponsorCampaignInputSchema, body);
    return toSponsorCampaignView(await this.campaignService.updateSponsorship(id, input));
  }

  @Delete("sponsor-campaigns/:id")
  @HttpCode(204)
  async deleteSponsorship(@Param("id") id: string): Promise<void> {
    await this.campaignService.deleteSponsorship(id);
  }
}
