import type { PledgeRepository } from "../challenges/challenge.repositories";
import type { Range } from "../common/pagination";
import type {
  CampaignPatch,
  CampaignProgress,
  CampaignRecord,
  CampaignRunnerPatch,
  CampaignRunnerRecord,
  SponsorCampaignRecord
} from "./campaign.types";

export const CAMPAIGN_REPOSITORY = Symbol("CAMPAIGN_REPOSITORY");
export const CAMPAIGN_RUNNER_REPOSITORY = Symbol("CAMPAIGN_RUNNER_REPOSITORY");
export const SPONSOR_CAMPAIGN_REPOSITORY = Symbol("SPONSOR_CAMPAIGN_REPOSITORY");

export interface CampaignListFilter extends Range {
  excludeOwnerId?: string;
  search?: string;
}

export interface CampaignRepository {
  create(campaign: CampaignRecord): Promise<CampaignRecord>;
  findById(id: string): Promise<CampaignRecord | null>;
  findBySlug(slug: string): Promise<CampaignRecord | null>;
  /**
   * Newest first. `search` matches name, description or location
   * case-insensitively.
   */
  list(filter: CampaignListFilter): Promise<CampaignRecord[]>;
  /** Newest first. */
  listByOwner(ownerId: string): Promise<CampaignRecord[]>;
  update(id: string, patch: CampaignPatch): Promise<CampaignRecord | null>;
  addMember(id: string, userId: string, updatedAt: Date): Promise<CampaignRecord | null>;
  /** Adds the sponsor to the set and `amount` to `moneyRaised` in one write. */
  addSponsorship(id: string, sponsorId: string, amount: number, updatedAt: Date): Promise<CampaignRecord | null>;
  /** Atomic increment of both totals; `null` when the campaign is gone. */
  incrementProgress(id: string, progress: CampaignProgress, updatedAt: Date): Promise<CampaignRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface CampaignRunnerFilter {
  campaignId?: string;
  ownerId?: string;
}

export interface CampaignRunnerRepository {
  create(runner: CampaignRunnerRecord): Promise<CampaignRunnerRecord>;
  findById(id: string): Promise<CampaignRunnerRecord | null>;
  /** Creation order, oldest first. */
  list(filter: CampaignRunnerFilter, range?: Range): Promise<CampaignRunnerRecord[]>;
  update(id: string, patch: CampaignRunnerPatch): Promise<CampaignRunnerRecord | null>;
  /** Increments the run's totals and replaces its duration in one write. */
  recordProgress(
    id: string,
    progress: CampaignProgress & { duration: string },
    updatedAt: Date
  ): Promise<CampaignRunnerRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface SponsorCampaignRepository extends PledgeRepository<SponsorCampaignRecord> {
  /** Oldest first; every campaign when `campaignId` is omitted. */
  list(campaignId: string | undefined, range: Range): Promise<SponsorCampaignRecord[]>;
  delete(id: string): Promise<boolean>;
}
