import { BadRequestException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import { SpanStatusCode } from "@opentelemetry/api";
import type {
  BuyCauseInput,
  CreateCauseInput,
  CreateChallengeInput,
  Page,
  Pagination,
  RecordActivityInput,
  SponsorCauseInput,
  SponsorChallengeInput,
  UpdateCauseInput,
  UpdateChallengeInput,
  UpdatePledgeInput
} from "@runfund/types";
import { CLOCK, ID_GENERATOR, type Clock, type IdGenerator } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { assertOwnership, omitUndefined } from "../common/records";
import { createSlug } from "../common/slug";
import { createModuleLogger } from "../observability/logger";
import { activityDistanceHistogram, apiTracer, pledgeAmountHistogram, pledgeCounter } from "../observability/telemetry";
import {
  CAUSE_BUYER_REPOSITORY,
  CAUSE_REPOSITORY,
  CAUSE_RUNNER_REPOSITORY,
  CHALLENGE_REPOSITORY,
  SPONSOR_CAUSE_REPOSITORY,
  SPONSOR_CHALLENGE_REPOSITORY,
  type CauseBuyerRepository,
  type CauseRepository,
  type CauseRunnerRepository,
  type ChallengeRepository,
  type PledgeRepository,
  type SponsorCauseRepository,
  type SponsorChallengeRepository
} from "./challenge.repositories";
import type {
  CauseBuyerRecord,
  CauseRecord,
  CauseRunnerRecord,
  ChallengeRecord,
  PledgeRecord,
  SponsorCauseRecord,
  SponsorChallengeRecord
} from "./challenge.types";
import { rankLeaderboard } from "./leaderboard";
import { computePledgeTotal } from "./pledge";

export interface LeaderboardOptions {
  causeId?: string;
  limit?: number;
}

@Injectable()
export class ChallengeService {
  private readonly logger = createModuleLogger("ChallengeService");

  constructor(
    @Inject(CHALLENGE_REPOSITORY) private readonly challenges: ChallengeRepository,
    @Inject(CAUSE_REPOSITORY) private readonly causes: CauseRepository,
    @Inject(CAUSE_RUNNER_REPOSITORY) private readonly runners: CauseRunnerRepository,
    @Inject(SPONSOR_CHALLENGE_REPOSITORY) private readonly challengePledges: SponsorChallengeRepository,
    @Inject(SPONSOR_CAUSE_REPOSITORY) private readonly causePledges: SponsorCauseRepository,
    @Inject(CAUSE_BUYER_REPOSITORY) private readonly buyers: CauseBuyerRepository,
    @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async createChallenge(ownerId: string, input: CreateChallengeInput): Promise<ChallengeRecord> {
    const id = this.generateId();
    const now = this.clock();

    const challenge = await this.challenges.create({
      ...input,
      id,
      ownerId,
      slug: createSlug(input.name, id),
      members: [],
      createdAt: now,
      updatedAt: now
    });

    this.logger.info({ event: "challenge.created", challengeId: id, ownerId }, "Challenge created");

    return challenge;
  }

  async getChallengeById(id: string): Promise<ChallengeRecord> {
    const challenge = await this.challenges.findById(id);

    if (!challenge) {
      throw new NotFoundException("Challenge not found.");
    }

    return challenge;
  }

  async getChallengeBySlug(slug: string): Promise<ChallengeRecord> {
    const challenge = await this.challenges.findBySlug(slug);

    if (!challenge) {
      throw new NotFoundException("Challenge not found.");
    }

    return challenge;
  }

  async listChallenges(pagination: Pagination): Promise<Page<ChallengeRecord>> {
    const challenges = await this.challenges.list(toRange(pagination));
    return toPage(challenges, pagination);
  }

  async updateChallenge(actorId: string, id: string, input: UpdateChallengeInput): Promise<ChallengeRecord> {
    const challenge = await this.getChallengeById(id);
    assertOwnership(actorId, challenge.ownerId, "Only the challenge owner can change it.");

    const updated = await this.challenges.update(id, { ...omitUndefined(input), updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Challenge not found.");
    }

    return updated;
  }

  async deleteChallenge(actorId: string, id: string): Promise<void> {
    const challenge = await this.getChallengeById(id);
    assertOwnership(actorId, challenge.ownerId, "Only the challenge owner can delete it.");

    if (!(await this.challenges.delete(id))) {
      throw new NotFoundException("Challenge not found.");
    }

    this.logger.info({ event: "challenge.deleted", challengeId: id }, "Challenge deleted");
  }

  async joinChallenge(userId: string, id: string): Promise<ChallengeRecord> {
    const challenge = await this.challenges.addMember(id, userId, this.clock());

    if (!challenge) {
      throw new NotFoundException("Challenge not found.");
    }

    return challenge;
  }

  async createCause(ownerId: string, input: CreateCauseInput): Promise<CauseRecord> {
    await this.getChallengeById(input.challengeId);

    const id = this.generateId();
    const now = this.clock();

    const cause = await this.causes.create({
      ...input,
      id,
      ownerId,
      distanceCovered: 0,
      slug: createSlug(input.name, id),
      members: [],
      createdAt: now,
      updatedAt: now
    });

    this.logger.info({ event: "cause.created", causeId: id, challengeId: input.challengeId, ownerId }, "Cause created");

    return cause;
  }

  async getCauseById(id: string): Promise<CauseRecord> {
    const cause = await this.causes.findById(id);

    if (!cause) {
      throw new NotFoundException("Cause not found.");
    }

    return cause;
  }

  async getCauseBySlug(slug: string): Promise<CauseRecord> {
    const cause = await this.causes.findBySlug(slug);

    if (!cause) {
      throw new NotFoundException("Cause not found.");
    }

    return cause;
  }

  async listCausesByChallenge(challengeId: string): Promise<CauseRecord[]> {
    await this.getChallengeById(challengeId);
    return this.causes.findByChallengeId(challengeId);
  }

  async updateCause(actorId: string, id: string, input: UpdateCauseInput): Promise<CauseRecord> {
    const cause = await this.getCauseById(id);
    assertOwnership(actorId, cause.ownerId, "Only the cause owner can change it.");

    const updated = await this.causes.update(id, { ...omitUndefined(input), updatedAt: this.clock() });

    if (!updated) {
      throw new NotFoundException("Cause not found.");
    }

    return updated;
  }

  async deleteCause(actorId: string, id: string): Promise<void> {
    const cause = await this.getCauseById(id);
    assertOwnership(actorId, cause.ownerId, "Only the cause owner can delete it.");

    if (!(await this.causes.delete(id))) {
      throw new NotFoundException("Cause not found.");
    }

    this.logger.info({ event: "cause.deleted", causeId: id }, "Cause deleted");
  }

  async joinCause(userId: string, id: string): Promise<CauseRecord> {
    const cause = await this.causes.addMember(id, userId, this.clock());

    if (!cause) {
      throw new NotFoundException("Cause not found.");
    }

    return cause;
  }

  /**
   * Stores the run, then adds its distance to the cause with an atomic
   * increment. The two writes are not transactional: when the cause is gone
   * the run stays stored and the caller gets a not-found error.
   */
  async recordCauseActivity(ownerId: string, input: RecordActivityInput): Promise<CauseRunnerRecord> {
    if (!(input.distanceToCover > 0) || !(input.distanceCovered > 0)) {
      throw new BadRequestException("Distance to cover and distance covered must be greater than zero.");
    }

    const span = apiTracer.startSpan("causes.record_activity", {
      attributes: { causeId: input.causeId, distanceCovered: input.distanceCovered }
    });

    try {
      const now = this.clock();
      const runner = await this.runners.create({
        id: this.generateId(),
        causeId: input.causeId,
        ownerId,
        distanceToCover: input.distanceToCover,
        distanceCovered: input.distanceCovered,
        duration: input.duration,
        moneyRaised: 0,
        coverImage: input.coverImage,
        activity: input.activity,
        dateJoined: now,
        createdAt: now,
        updatedAt: now
      });

      const cause = await this.causes.incrementDistanceCovered(input.causeId, input.distanceCovered, now);

      if (!cause) {
        this.logger.warn(
          { event: "cause.activity_orphaned", causeId: input.causeId, runnerId: runner.id },
          "Activity stored for a cause that no longer exists"
        );
        throw new NotFoundException("Cause not found.");
      }

      activityDistanceHistogram.record(input.distanceCovered, { activity: input.activity });
      span.setStatus({ code: SpanStatusCode.OK });
      this.logger.info(
        {
          event: "cause.activity_recorded",
          causeId: cause.id,
          runnerId: runner.id,
          ownerId,
          distanceCovered: input.distanceCovered,
          causeDistanceCovered: cause.distanceCovered
        },
        "Cause activity recorded"
      );

      return runner;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      }
      throw error;
    } finally {
      span.end();
    }
  }

  async listCauseRunners(causeId: string): Promise<CauseRunnerRecord[]> {
    await this.getCauseById(causeId);
    return this.runners.list({ causeId });
  }

  async getLeaderboard({ causeId, limit }: LeaderboardOptions = {}): Promise<CauseRunnerRecord[]> {
    const ranked = rankLeaderboard(await this.runners.list({ causeId }));
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  async sponsorChallenge(sponsorId: string, input: SponsorChallengeInput): Promise<SponsorChallengeRecord> {
    await this.getChallengeById(input.challengeId);

    const pledge = await this.challengePledges.create({
      ...this.buildPledge(sponsorId, input.distance, input.amountPerKm, input.brandImg, input.videoUrl),
      challengeId: input.challengeId
    });

    this.recordPledge("challenge", pledge);

    return pledge;
  }

  async sponsorCause(sponsorId: string, input: SponsorCauseInput): Promise<SponsorCauseRecord> {
    await this.getCauseById(input.causeId);

    const pledge = await this.causePledges.create({
      ...this.buildPledge(sponsorId, input.distance, input.amountPerKm, input.brandImg, input.videoUrl),
      causeId: input.causeId
    });

    this.recordPledge("cause", pledge);

    return pledge;
  }

  async listChallengeSponsors(challengeId: string): Promise<SponsorChallengeRecord[]> {
    await this.getChallengeById(challengeId);
    return this.challengePledges.findByTargetId(challengeId);
  }

  async listCauseSponsors(causeId: string): Promise<SponsorCauseRecord[]> {
    await this.getCauseById(causeId);
    return this.causePledges.findByTargetId(causeId);
  }

  updateChallengePledge(actorId: string, pledgeId: string, input: UpdatePledgeInput): Promise<SponsorChallengeRecord> {
    return this.updatePledge(this.challengePledges, "challenge", actorId, pledgeId, input);
  }

  updateCausePledge(actorId: string, pledgeId: string, input: UpdatePledgeInput): Promise<SponsorCauseRecord> {
    return this.updatePledge(this.causePledges, "cause", actorId, pledgeId, input);
  }

  async buyCause(buyerId: string, input: BuyCauseInput): Promise<CauseBuyerRecord> {
    await this.getCauseById(input.causeId);

    const now = this.clock();
    const purchase = await this.buyers.create({
      id: this.generateId(),
      buyerId,
      causeId: input.causeId,
      amount: input.amount,
      dateBought: now,
      createdAt: now,
      updatedAt: now
    });

    this.logger.info(
      { event: "cause.purchased", causeId: input.causeId, buyerId, amount: input.amount },
      "Cause purchase recorded"
    );

    return purchase;
  }

  async listCausePurchases(causeId: string): Promise<CauseBuyerRecord[]> {
    await this.getCauseById(causeId);
    return this.buyers.findByCauseId(causeId);
  }

  private buildPledge(
    sponsorId: string,
    distance: number,
    amountPerKm: number,
    brandImg: string,
    videoUrl: string
  ): PledgeRecord {
    const now = this.clock();

    return {
      id: this.generateId(),
      sponsorId,
      distance,
      amountPerKm,
      totalAmount: computePledgeTotal(distance, amountPerKm),
      brandImg,
      videoUrl,
      createdAt: now,
      updatedAt: now
    };
  }

  /** Recomputes the total whenever the distance or the rate changes. */
  private async updatePledge<TPledge extends PledgeRecord>(
    repository: PledgeRepository<TPledge>,
    target: "challenge" | "cause",
    actorId: string,
    pledgeId: string,
    input: UpdatePledgeInput
  ): Promise<TPledge> {
    const pledge = await repository.findById(pledgeId);

    if (!pledge) {
      throw new NotFoundException("Pledge not found.");
    }

    assertOwnership(actorId, pledge.sponsorId, "Only the sponsor can change this pledge.");

    const distance = input.distance ?? pledge.distance;
    const amountPerKm = input.amountPerKm ?? pledge.amountPerKm;
    const updated = await repository.update(pledgeId, {
      ...omitUndefined(input),
      totalAmount: computePledgeTotal(distance, amountPerKm),
      updatedAt: this.clock()
    });

    if (!updated) {
      throw new NotFoundException("Pledge not found.");
    }

    this.recordPledge(target, updated);

    return updated;
  }

  private recordPledge(target: "challenge" | "cause", pledge: PledgeRecord) {
    pledgeCounter.add(1, { target });
    pledgeAmountHistogram.record(pledge.totalAmount, { target });
    this.logger.info(
      { event: "sponsorship.pledged", target, pledgeId: pledge.id, sponsorId: pledge.sponsorId, totalAmount: pledge.totalAmount },
      "Sponsor pledge saved"
    );
  }
}
