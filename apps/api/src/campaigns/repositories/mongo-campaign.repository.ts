import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { FilterQuery, Model, UpdateQuery } from "mongoose";
import { containsPattern } from "../../common/records";
import type { CampaignListFilter, CampaignRepository } from "../campaign.repositories";
import type { CampaignPatch, CampaignProgress, CampaignRecord } from "../campaign.types";
import { CampaignEntity } from "../schemas/campaign.schema";

const toCampaignRecord = ({ _id, ...rest }: CampaignEntity): CampaignRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCampaignRepository implements CampaignRepository {
  constructor(@InjectModel(CampaignEntity.name) private readonly model: Model<CampaignEntity>) {}

  async create(campaign: CampaignRecord): Promise<CampaignRecord> {
    const { id, ...rest } = campaign;
    await this.model.create({ _id: id, ...rest });
    return campaign;
  }

  async findById(id: string): Promise<CampaignRecord | null> {
    const entity = await this.model.findById(id).lean<CampaignEntity>().exec();
    return entity ? toCampaignRecord(entity) : null;
  }

  async findBySlug(slug: string): Promise<CampaignRecord | null> {
    const entity = await this.model.findOne({ slug }).lean<CampaignEntity>().exec();
    return entity ? toCampaignRecord(entity) : null;
  }

  async list({ excludeOwnerId, search, offset, limit }: CampaignListFilter): Promise<CampaignRecord[]> {
    const filter: FilterQuery<CampaignEntity> = {};

    if (excludeOwnerId) {
      filter.ownerId = { $ne: excludeOwnerId };
    }

    if (search) {
      const pattern = containsPattern(search);
      filter.$or = [{ name: pattern }, { description: pattern }, { location: pattern }];
    }

    const entities = await this.model
      .find(filter)
      .sort({ createdAt: -1, _id: -1 })
      .skip(offset)
      .limit(limit)
      .lean<CampaignEntity[]>()
      .exec();
    return entities.map(toCampaignRecord);
  }

  async listByOwner(ownerId: string): Promise<CampaignRecord[]> {
    const entities = await this.model.find({ ownerId }).sort({ createdAt: -1, _id: -1 }).lean<CampaignEntity[]>().exec();
    return entities.map(toCampaignRecord);
  }

  update(id: string, patch: CampaignPatch): Promise<CampaignRecord | null> {
    return this.apply(id, { $set: patch });
  }

  addMember(id: string, userId: string, updatedAt: Date): Promise<CampaignRecord | null> {
    return this.apply(id, { $addToSet: { members: userId }, $set: { updatedAt } });
  }

  addSponsorship(id: string, sponsorId: string, amount: number, updatedAt: Date): Promise<CampaignRecord | null> {
    return this.apply(id, { $addToSet: { sponsors: sponsorId }, $inc: { moneyRaised: amount }, $set: { updatedAt } });
  }

  incrementProgress(id: string, progress: CampaignProgress, updatedAt: Date): Promise<CampaignRecord | null> {
    return this.apply(id, {
      $inc: { distanceCovered: progress.distanceCovered, moneyRaised: progress.moneyRaised },
      $set: { updatedAt }
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  private async apply(id: string, update: UpdateQuery<CampaignEntity>): Promise<CampaignRecord | null> {
    const entity = await this.model.findOneAndUpdate({ _id: id }, update, { new: true }).lean<CampaignEntity>().exec();
    return entity ? toCampaignRecord(entity) : null;
  }
}
