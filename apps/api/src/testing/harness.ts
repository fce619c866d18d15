import { CampaignService } from "../campaigns/campaign.service";
import { ChallengeService } from "../challenges/challenge.service";
import type { SponsorCauseRecord, SponsorChallengeRecord } from "../challenges/challenge.types";
import type { UserRecord } from "../users/user.types";
import { UserService } from "../users/user.service";
import {
  InMemoryCampaignRepository,
  InMemoryCampaignRunnerRepository,
  InMemorySponsorCampaignRepository
} from "./in-memory-campaign.repositories";
import {
  InMemoryCauseBuyerRepository,
  InMemoryCauseRepository,
  InMemoryCauseRunnerRepository,
  InMemoryChallengeRepository,
  InMemoryPledgeRepository
} from "./in-memory-challenge.repositories";
import { InMemoryUserRepository } from "./in-memory-user.repository";
import { createSequentialIds, ManualClock } from "./fixtures";

/** Wires the services against in-process repositories with a manual clock and predictable ids. */
export const createChallengeHarness = (users: UserRecord[] = []) => {
  const clock = new ManualClock();
  const repositories = {
    challenges: new InMemoryChallengeRepository(),
    causes: new InMemoryCauseRepository(),
    runners: new InMemoryCauseRunnerRepository(),
    challengePledges: new InMemoryPledgeRepository<SponsorChallengeRecord>((pledge) => pledge.challengeId),
    causePledges: new InMemoryPledgeRepository<SponsorCauseRecord>((pledge) => pledge.causeId),
    buyers: new InMemoryCauseBuyerRepository(),
    users: new InMemoryUserRepository(users)
  };

  const challengeService = new ChallengeService(
    repositories.challenges,
    repositories.causes,
    repositories.runners,
    repositories.challengePledges,
    repositories.causePledges,
    repositories.buyers,
    createSequentialIds(),
    clock.now
  );
  const userService = new UserService(repositories.users, clock.now);

  return { clock, repositories, challengeService, userService };
};

export const createCampaignHarness = (users: UserRecord[] = []) => {
  const clock = new ManualClock();
  const repositories = {
    campaigns: new InMemoryCampaignRepository(),
    runners: new InMemoryCampaignRunnerRepository(),
    pledges: new InMemorySponsorCampaignRepository(),
    users: new InMemoryUserRepository(users)
  };

  const userService = new UserService(repositories.users, clock.now);
  const campaignService = new CampaignService(
    repositories.campaigns,
    repositories.runners,
    repositories.pledges,
    userService,
    createSequentialIds(),
    clock.now
  );

  return { clock, repositories, campaignService, userService };
};
