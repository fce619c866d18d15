import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { UsersModule } from "../users/users.module";
import { CampaignAdminController } from "./campaign-admin.controller";
import {
  CAMPAIGN_REPOSITORY,
  CAMPAIGN_RUNNER_REPOSITORY,
  SPONSOR_CAMPAIGN_REPOSITORY
} from "./campaign.repositories";
import { CampaignService } from "./campaign.service";
import { CampaignsController } from "./campaigns.controller";
import { MongoCampaignRunnerRepository } from "./repositories/mongo-campaign-runner.repository";
import { MongoCampaignRepository } from "./repositories/mongo-campaign.repository";
import { MongoSponsorCampaignRepository } from "./repositories/mongo-sponsor-campaign.repository";
import { CampaignRunnerEntity, CampaignRunnerSchema } from "./schemas/campaign-runner.schema";
import { CampaignEntity, CampaignSchema } from "./schemas/campaign.schema";
import { SponsorCampaignEntity, SponsorCampaignSchema } from "./schemas/sponsor-campaign.schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: CampaignEntity.name, schema: CampaignSchema },
      { name: CampaignRunnerEntity.name, schema: CampaignRunnerSchema },
      { name: SponsorCampaignEntity.name, schema: SponsorCampaignSchema }
    ]),
    UsersModule
  ],
  controllers: [CampaignsController, CampaignAdminController],
  providers: [
    { provide: CAMPAIGN_REPOSITORY, useClass: MongoCampaignRepository },
    { provide: CAMPAIGN_RUNNER_REPOSITORY, useClass: MongoCampaignRunnerRepository },
    { provide: SPONSOR_CAMPAIGN_REPOSITORY, useClass: MongoSponsorCampaignRepository },
    CampaignService
  ]
})
export class CampaignsModule {}
