import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { SponsorCauseRepository, SponsorChallengeRepository } from "../challenge.repositories";
import type { PledgePatch, SponsorCauseRecord, SponsorChallengeRecord } from "../challenge.types";
import { SponsorCauseEntity, SponsorChallengeEntity } from "../schemas/pledge.schema";

const toSponsorChallengeRecord = ({ _id, ...rest }: SponsorChallengeEntity): SponsorChallengeRecord => ({
  id: _id,
  ...rest
});

const toSponsorCauseRecord = ({ _id, ...rest }: SponsorCauseEntity): SponsorCauseRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoSponsorChallengeRepository implements SponsorChallengeRepository {
  constructor(@InjectModel(SponsorChallengeEntity.name) private readonly model: Model<SponsorChallengeEntity>) {}

  async create(pledge: SponsorChallengeRecord): Promise<SponsorChallengeRecord> {
    const { id, ...rest } = pledge;
    await this.model.create({ _id: id, ...rest });
    return pledge;
  }

  async findById(id: string): Promise<SponsorChallengeRecord | null> {
    const entity = await this.model.findById(id).lean<SponsorChallengeEntity>().exec();
    return entity ? toSponsorChallengeRecord(entity) : null;
  }

  async findByTargetId(challengeId: string): Promise<SponsorChallengeRecord[]> {
    const entities = await this.model
      .find({ challengeId })
      .sort({ createdAt: 1, _id: 1 })
      .lean<SponsorChallengeEntity[]>()
      .exec();
    return entities.map(toSponsorChallengeRecord);
  }

  async update(id: string, patch: PledgePatch): Promise<SponsorChallengeRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<SponsorChallengeEntity>()
      .exec();
    return entity ? toSponsorChallengeRecord(entity) : null;
  }
}

@Injectable()
export class MongoSponsorCauseRepository implements SponsorCauseRepository {
  constructor(@InjectModel(SponsorCauseEntity.name) private readonly model: Model<SponsorCauseEntity>) {}

  async create(pledge: SponsorCauseRecord): Promise<SponsorCauseRecord> {
    const { id, ...rest } = pledge;
    await this.model.create({ _id: id, ...rest });
    return pledge;
  }

  async findById(id: string): Promise<SponsorCauseRecord | null> {
    const entity = await this.model.findById(id).lean<SponsorCauseEntity>().exec();
    return entity ? toSponsorCauseRecord(entity) : null;
  }

  async findByTargetId(causeId: string): Promise<SponsorCauseRecord[]> {
    const entities = await this.model
      .find({ causeId })
      .sort({ createdAt: 1, _id: 1 })
      .lean<SponsorCauseEntity[]>()
      .exec();
    return entities.map(toSponsorCauseRecord);
  }

  async update(id: string, patch: PledgePatch): Promise<SponsorCauseRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<SponsorCauseEntity>()
      .exec();
    return entity ? toSponsorCauseRecord(entity) : null;
  }
}
