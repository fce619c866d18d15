import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { UsersModule } from "../users/users.module";
import {
  CAUSE_BUYER_REPOSITORY,
  CAUSE_REPOSITORY,
  CAUSE_RUNNER_REPOSITORY,
  CHALLENGE_REPOSITORY,
  SPONSOR_CAUSE_REPOSITORY,
  SPONSOR_CHALLENGE_REPOSITORY
} from "./challenge.repositories";
import { ChallengeService } from "./challenge.service";
import { ChallengesController } from "./challenges.controller";
import { CausesController } from "./causes.controller";
import { MongoCauseBuyerRepository } from "./repositories/mongo-cause-buyer.repository";
import { MongoCauseRunnerRepository } from "./repositories/mongo-cause-runner.repository";
import { MongoCauseRepository } from "./repositories/mongo-cause.repository";
import { MongoChallengeRepository } from "./repositories/mongo-challenge.repository";
import { MongoSponsorCauseRepository, MongoSponsorChallengeRepository } from "./repositories/mongo-pledge.repositories";
import { CauseBuyerEntity, CauseBuyerSchema } from "./schemas/cause-buyer.schema";
import { CauseRunnerEntity, CauseRunnerSchema } from "./schemas/cause-runner.schema";
import { CauseEntity, CauseSchema } from "./schemas/cause.schema";
import { ChallengeEntity, ChallengeSchema } from "./schemas/challenge.schema";
import {
  SponsorCauseEntity,
  SponsorCauseSchema,
  SponsorChallengeEntity,
  SponsorChallengeSchema
} from "./schemas/pledge.schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ChallengeEntity.name, schema: ChallengeSchema },
      { name: CauseEntity.name, schema: CauseSchema },
      { name: CauseRunnerEntity.name, schema: CauseRunnerSchema },
      { name: SponsorChallengeEntity.name, schema: SponsorChallengeSchema },
      { name: SponsorCauseEntity.name, schema: SponsorCauseSchema },
      { name: CauseBuyerEntity.name, schema: CauseBuyerSchema }
    ]),
    UsersModule
  ],
  controllers: [ChallengesController, CausesController],
  providers: [
    { provide: CHALLENGE_REPOSITORY, useClass: MongoChallengeRepository },
    { provide: CAUSE_REPOSITORY, useClass: MongoCauseRepository },
    { provide: CAUSE_RUNNER_REPOSITORY, useClass: MongoCauseRunnerRepository },
    { provide: SPONSOR_CHALLENGE_REPOSITORY, useClass: MongoSponsorChallengeRepository },
    { provide: SPONSOR_CAUSE_REPOSITORY, useClass: MongoSponsorCauseRepository },
    { provide: CAUSE_BUYER_REPOSITORY, useClass: MongoCauseBuyerRepository },
    ChallengeService
  ]
})
export class ChallengesModule {}
