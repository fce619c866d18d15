import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { CauseRepository } from "../challenge.repositories";
import type { CausePatch, CauseRecord } from "../challenge.types";
import { CauseEntity } from "../schemas/cause.schema";

const toCauseRecord = ({ _id, ...rest }: CauseEntity): CauseRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCauseRepository implements CauseRepository {
  constructor(@InjectModel(CauseEntity.name) private readonly model: Model<CauseEntity>) {}

  async create(cause: CauseRecord): Promise<CauseRecord> {
    const { id, ...rest } = cause;
    await this.model.create({ _id: id, ...rest });
    return cause;
  }

  async findById(id: string): Promise<CauseRecord | null> {
    const entity = await this.model.findById(id).lean<CauseEntity>().exec();
    return entity ? toCauseRecord(entity) : null;
  }

  async findBySlug(slug: string): Promise<CauseRecord | null> {
    const entity = await this.model.findOne({ slug }).lean<CauseEntity>().exec();
    return entity ? toCauseRecord(entity) : null;
  }

  async findByChallengeId(challengeId: string): Promise<CauseRecord[]> {
    const entities = await this.model.find({ challengeId }).sort({ createdAt: 1, _id: 1 }).lean<CauseEntity[]>().exec();
    return entities.map(toCauseRecord);
  }

  async update(id: string, patch: CausePatch): Promise<CauseRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<CauseEntity>()
      .exec();
    return entity ? toCauseRecord(entity) : null;
  }

  async addMember(id: string, userId: string, updatedAt: Date): Promise<CauseRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $addToSet: { members: userId }, $set: { updatedAt } }, { new: true })
      .lean<CauseEntity>()
      .exec();
    return entity ? toCauseRecord(entity) : null;
  }

  async incrementDistanceCovered(id: string, distance: number, updatedAt: Date): Promise<CauseRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $inc: { distanceCovered: distance }, $set: { updatedAt } }, { new: true })
      .lean<CauseEntity>()
      .exec();
    return entity ? toCauseRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }
}
