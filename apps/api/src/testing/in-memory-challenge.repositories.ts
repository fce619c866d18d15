import type { Range } from "../common/pagination";
import type {
  CauseBuyerRepository,
  CauseRepository,
  CauseRunnerFilter,
  CauseRunnerRepository,
  ChallengeRepository,
  PledgeRepository
} from "../challenges/challenge.repositories";
import type {
  CauseBuyerRecord,
  CausePatch,
  CauseRecord,
  CauseRunnerRecord,
  ChallengePatch,
  ChallengeRecord,
  PledgePatch,
  PledgeRecord
} from "../challenges/challenge.types";
import { InMemoryCollection, paginate } from "./in-memory-collection";

const newestFirst = <T extends { createdAt: Date }>(records: T[]): T[] =>
  records.reverse().sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime());

const withMember = (members: string[], userId: string): string[] =>
  members.includes(userId) ? members : [...members, userId];

export class InMemoryChallengeRepository implements ChallengeRepository {
  readonly challenges = new InMemoryCollection<ChallengeRecord>(["slug"]);

  async create(challenge: ChallengeRecord): Promise<ChallengeRecord> {
    return this.challenges.insert(challenge);
  }

  async findById(id: string): Promise<ChallengeRecord | null> {
    return this.challenges.get(id);
  }

  async findBySlug(slug: string): Promise<ChallengeRecord | null> {
    return this.challenges.findOne((challenge) => challenge.slug === slug);
  }

  async list({ offset, limit }: Range): Promise<ChallengeRecord[]> {
    return paginate(newestFirst(this.challenges.filter()), offset, limit);
  }

  async update(id: string, patch: ChallengePatch): Promise<ChallengeRecord | null> {
    return this.challenges.update(id, (current) => ({ ...current, ...patch }));
  }

  async addMember(id: string, userId: string, updatedAt: Date): Promise<ChallengeRecord | null> {
    return this.challenges.update(id, (current) => ({ ...current, members: withMember(current.members, userId), updatedAt }));
  }

  async delete(id: string): Promise<boolean> {
    return this.challenges.delete(id);
  }
}

export class InMemoryCauseRepository implements CauseRepository {
  readonly causes = new InMemoryCollection<CauseRecord>(["slug"]);

  async create(cause: CauseRecord): Promise<CauseRecord> {
    return this.causes.insert(cause);
  }

  async findById(id: string): Promise<CauseRecord | null> {
    return this.causes.get(id);
  }

  async findBySlug(slug: string): Promise<CauseRecord | null> {
    return this.causes.findOne((cause) => cause.slug === slug);
  }

  async findByChallengeId(challengeId: string): Promise<CauseRecord[]> {
    return this.causes.filter((cause) => cause.challengeId === challengeId);
  }

  async update(id: string, patch: CausePatch): Promise<CauseRecord | null> {
    return this.causes.update(id, (current) => ({ ...current, ...patch }));
  }

  async addMember(id: string, userId: string, updatedAt: Date): Promise<CauseRecord | null> {
    return this.causes.update(id, (current) => ({ ...current, members: withMember(current.members, userId), updatedAt }));
  }

  async incrementDistanceCovered(id: string, distance: number, updatedAt: Date): Promise<CauseRecord | null> {
    return this.causes.update(id, (current) => ({
      ...current,
      distanceCovered: current.distanceCovered + distance,
      updatedAt
    }));
  }

  async delete(id: string): Promise<boolean> {
    return this.causes.delete(id);
  }
}

export class InMemoryCauseRunnerRepository implements CauseRunnerRepository {
  readonly runners = new InMemoryCollection<CauseRunnerRecord>();
  failNextCreate: Error | null = null;

  async create(runner: CauseRunnerRecord): Promise<CauseRunnerRecord> {
    if (this.failNextCreate) {
      const error = this.failNextCreate;
      this.failNextCreate = null;
      throw error;
    }

    return this.runners.insert(runner);
  }

  async list({ causeId }: CauseRunnerFilter): Promise<CauseRunnerRecord[]> {
    return this.runners.filter((runner) => !causeId || runner.causeId === causeId);
  }
}

export class InMemoryPledgeRepository<TPledge extends PledgeRecord> implements PledgeRepository<TPledge> {
  readonly pledges = new InMemoryCollection<TPledge>();

  constructor(private readonly targetOf: (pledge: TPledge) => string) {}

  async create(pledge: TPledge): Promise<TPledge> {
    return this.pledges.insert(pledge);
  }

  async findById(id: string): Promise<TPledge | null> {
    return this.pledges.get(id);
  }

  async findByTargetId(targetId: string): Promise<TPledge[]> {
    return this.pledges.filter((pledge) => this.targetOf(pledge) === targetId);
  }

  async update(id: string, patch: PledgePatch): Promise<TPledge | null> {
    return this.pledges.update(id, (current) => ({ ...current, ...patch }));
  }
}

export class InMemoryCauseBuyerRepository implements CauseBuyerRepository {
  readonly purchases = new InMemoryCollection<CauseBuyerRecord>();

  async create(purchase: CauseBuyerRecord): Promise<CauseBuyerRecord> {
    return this.purchases.insert(purchase);
  }

  async findByCauseId(causeId: string): Promise<CauseBuyerRecord[]> {
    return this.purchases.filter((purchase) => purchase.causeId === causeId);
  }
}
