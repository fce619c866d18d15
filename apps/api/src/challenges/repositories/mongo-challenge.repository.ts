import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { Range } from "../../common/pagination";
import type { ChallengeRepository } from "../challenge.repositories";
import type { ChallengePatch, ChallengeRecord } from "../challenge.types";
import { ChallengeEntity } from "../schemas/challenge.schema";

const toChallengeRecord = ({ _id, ...rest }: ChallengeEntity): ChallengeRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoChallengeRepository implements ChallengeRepository {
  constructor(@InjectModel(ChallengeEntity.name) private readonly model: Model<ChallengeEntity>) {}

  async create(challenge: ChallengeRecord): Promise<ChallengeRecord> {
    const { id, ...rest } = challenge;
    await this.model.create({ _id: id, ...rest });
    return challenge;
  }

  async findById(id: string): Promise<ChallengeRecord | null> {
    const entity = await this.model.findById(id).lean<ChallengeEntity>().exec();
    return entity ? toChallengeRecord(entity) : null;
  }

  async findBySlug(slug: string): Promise<ChallengeRecord | null> {
    const entity = await this.model.findOne({ slug }).lean<ChallengeEntity>().exec();
    return entity ? toChallengeRecord(entity) : null;
  }

  async list({ offset, limit }: Range): Promise<ChallengeRecord[]> {
    const entities = await this.model
      .find({})
      .sort({ createdAt: -1, _id: -1 })
      .skip(offset)
      .limit(limit)
      .lean<ChallengeEntity[]>()
      .exec();
    return entities.map(toChallengeRecord);
  }

  async update(id: string, patch: ChallengePatch): Promise<ChallengeRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<ChallengeEntity>()
      .exec();
    return entity ? toChallengeRecord(entity) : null;
  }

  async addMember(id: string, userId: string, updatedAt: Date): Promise<ChallengeRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $addToSet: { members: userId }, $set: { updatedAt } }, { new: true })
      .lean<ChallengeEntity>()
      .exec();
    return entity ? toChallengeRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }
}
