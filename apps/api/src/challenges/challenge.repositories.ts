import type { Range } from "../common/pagination";
import type {
  CauseBuyerRecord,
  CausePatch,
  CauseRecord,
  CauseRunnerRecord,
  ChallengePatch,
  ChallengeRecord,
  PledgePatch,
  PledgeRecord,
  SponsorCauseRecord,
  SponsorChallengeRecord
} from "./challenge.types";

export const CHALLENGE_REPOSITORY = Symbol("CHALLENGE_REPOSITORY");
export const CAUSE_REPOSITORY = Symbol("CAUSE_REPOSITORY");
export const CAUSE_RUNNER_REPOSITORY = Symbol("CAUSE_RUNNER_REPOSITORY");
export const SPONSOR_CHALLENGE_REPOSITORY = Symbol("SPONSOR_CHALLENGE_REPOSITORY");
export const SPONSOR_CAUSE_REPOSITORY = Symbol("SPONSOR_CAUSE_REPOSITORY");
export const CAUSE_BUYER_REPOSITORY = Symbol("CAUSE_BUYER_REPOSITORY");

export interface ChallengeRepository {
  create(challenge: ChallengeRecord): Promise<ChallengeRecord>;
  findById(id: string): Promise<ChallengeRecord | null>;
  findBySlug(slug: string): Promise<ChallengeRecord | null>;
  /** Newest first. */
  list(range: Range): Promise<ChallengeRecord[]>;
  update(id: string, patch: ChallengePatch): Promise<ChallengeRecord | null>;
  addMember(id: string, userId: string, updatedAt: Date): Promise<ChallengeRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface CauseRepository {
  create(cause: CauseRecord): Promise<CauseRecord>;
  findById(id: string): Promise<CauseRecord | null>;
  findBySlug(slug: string): Promise<CauseRecord | null>;
  /** Oldest first. */
  findByChallengeId(challengeId: string): Promise<CauseRecord[]>;
  update(id: string, patch: CausePatch): Promise<CauseRecord | null>;
  addMember(id: string, userId: string, updatedAt: Date): Promise<CauseRecord | null>;
  /**
   * Adds `distance` to the stored aggregate in a single atomic write.
   * Resolves `null` when the cause does not exist.
   */
  incrementDistanceCovered(id: string, distance: number, updatedAt: Date): Promise<CauseRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface CauseRunnerFilter {
  causeId?: string;
}

export interface CauseRunnerRepository {
  create(runner: CauseRunnerRecord): Promise<CauseRunnerRecord>;
  /** Creation order, oldest first. */
  list(filter: CauseRunnerFilter): Promise<CauseRunnerRecord[]>;
}

export interface PledgeRepository<TPledge extends PledgeRecord> {
  create(pledge: TPledge): Promise<TPledge>;
  findById(id: string): Promise<TPledge | null>;
  /** Pledges for one challenge or cause, oldest first. */
  findByTargetId(targetId: string): Promise<TPledge[]>;
  update(id: string, patch: PledgePatch): Promise<TPledge | null>;
}

export type SponsorChallengeRepository = PledgeRepository<SponsorChallengeRecord>;
export type SponsorCauseRepository = PledgeRepository<SponsorCauseRecord>;

export interface CauseBuyerRepository {
  create(purchase: CauseBuyerRecord): Promise<CauseBuyerRecord>;
  findByCauseId(causeId: string): Promise<CauseBuyerRecord[]>;
}
