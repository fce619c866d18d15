import type { Activity, ChallengeMode } from "@runfund/types";

interface Timestamps {
  createdAt: Date;
  updatedAt: Date;
}

export interface ChallengeRecord extends Timestamps {
  id: string;
  ownerId: string;
  name: string;
  description: string;
  mode: ChallengeMode;
  condition: string;
  goal: string;
  location: string;
  distanceToCover: number;
  targetAmount: number;
  targetAmountPerKm: number;
  startDuration: string;
  endDuration: string;
  noOfWinner: number;
  winningPrice: number[];
  causePrice: number[];
  coverImage: string;
  videoUrl: string;
  slug: string;
  members: string[];
}

export interface CauseRecord extends Timestamps {
  id: string;
  challengeId: string;
  ownerId: string;
  name: string;
  problem: string;
  solution: string;
  productDescription: string;
  activity: Activity;
  location: string;
  description: string;
  isCommercial: boolean;
  whoIdeaImpact: string;
  /** Running total of every recorded activity; only ever incremented. */
  distanceCovered: number;
  amountPerPiece: number;
  duration: string;
  fundCause: boolean;
  fundAmount: number;
  willingAmount: number;
  unitPrice: number;
  costToLaunch: string;
  benefitDesc: string;
  workoutImg: string;
  videoUrl: string;
  slug: string;
  members: string[];
}

export interface CauseRunnerRecord extends Timestamps {
  id: string;
  causeId: string;
  ownerId: string;
  distanceToCover: number;
  distanceCovered: number;
  /** Empty while the activity is unfinished. */
  duration: string;
  moneyRaised: number;
  coverImage: string;
  activity: string;
  dateJoined: Date;
}

export interface PledgeRecord extends Timestamps {
  id: string;
  sponsorId: string;
  distance: number;
  amountPerKm: number;
  totalAmount: number;
  brandImg: string;
  videoUrl: string;
}

export interface SponsorChallengeRecord extends PledgeRecord {
  challengeId: string;
}

export interface SponsorCauseRecord extends PledgeRecord {
  causeId: string;
}

export interface CauseBuyerRecord extends Timestamps {
  id: string;
  buyerId: string;
  causeId: string;
  amount: number;
  dateBought: Date;
}

type Immutable = "id" | "ownerId" | "slug" | "members" | "createdAt";

export type ChallengePatch = Partial<Omit<ChallengeRecord, Immutable>>;
export type CausePatch = Partial<Omit<CauseRecord, Immutable | "challengeId" | "distanceCovered">>;
export type PledgePatch = Partial<Pick<PledgeRecord, "distance" | "amountPerKm" | "totalAmount" | "brandImg" | "videoUrl" | "updatedAt">>;
