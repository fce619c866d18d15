import type { Campaign, CampaignRunner, SponsorCampaign } from "@runfund/types";
import type { UserDirectory } from "../challenges/challenge.views";
import { toOwnerSummary } from "../users/user.views";
import type { CampaignRecord, CampaignRunnerRecord, SponsorCampaignRecord } from "./campaign.types";

export const toCampaignView = (
  { createdAt, updatedAt, ownerId, ...campaign }: CampaignRecord,
  users: UserDirectory
): Campaign => ({
  ...campaign,
  owner: toOwnerSummary(users.get(ownerId)),
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toCampaignRunnerView = ({
  createdAt,
  updatedAt,
  dateJoined,
  ...runner
}: CampaignRunnerRecord): CampaignRunner => ({
  ...runner,
  dateJoined: dateJoined.toISOString()
});

export const toSponsorCampaignView = ({ createdAt, updatedAt, ...pledge }: SponsorCampaignRecord): SponsorCampaign => ({
  ...pledge,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});
