import type { Activity, ChallengeMode } from "@runfund/types";
import type { PledgeRecord } from "../challenges/challenge.types";

export interface CampaignRecord {
  id: string;
  ownerId: string;
  name: string;
  description: string;
  condition: string;
  mode: ChallengeMode;
  goal: string;
  activity: Activity;
  acceptTac: boolean;
  location: string;
  /** Sum of sponsorships and finished runs at the time they were recorded. */
  moneyRaised: number;
  targetAmount: number;
  targetAmountPerKm: number;
  distanceToCover: number;
  distanceCovered: number;
  startDuration: string;
  endDuration: string;
  workoutImg: string;
  slug: string;
  members: string[];
  sponsors: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface CampaignRunnerRecord {
  id: string;
  campaignId: string;
  ownerId: string;
  distanceCovered: number;
  /** Empty until the run is finished. */
  duration: string;
  moneyRaised: number;
  coverImage: string;
  activity: string;
  dateJoined: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface SponsorCampaignRecord extends PledgeRecord {
  campaignId: string;
}

export interface CampaignProgress {
  distanceCovered: number;
  moneyRaised: number;
}

export type CampaignPatch = Partial<
  Omit<CampaignRecord, "id" | "ownerId" | "slug" | "members" | "sponsors" | "moneyRaised" | "distanceCovered" | "createdAt">
>;
export type CampaignRunnerPatch = Partial<
  Pick<CampaignRunnerRecord, "activity" | "distanceCovered" | "duration" | "moneyRaised" | "coverImage" | "updatedAt">
>;
