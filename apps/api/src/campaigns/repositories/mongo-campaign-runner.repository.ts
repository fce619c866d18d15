import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { FilterQuery, Model } from "mongoose";
import type { Range } from "../../common/pagination";
import type { CampaignRunnerFilter, CampaignRunnerRepository } from "../campaign.repositories";
import type { CampaignProgress, CampaignRunnerPatch, CampaignRunnerRecord } from "../campaign.types";
import { CampaignRunnerEntity } from "../schemas/campaign-runner.schema";

const toCampaignRunnerRecord = ({ _id, ...rest }: CampaignRunnerEntity): CampaignRunnerRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCampaignRunnerRepository implements CampaignRunnerRepository {
  constructor(@InjectModel(CampaignRunnerEntity.name) private readonly model: Model<CampaignRunnerEntity>) {}

  async create(runner: CampaignRunnerRecord): Promise<CampaignRunnerRecord> {
    const { id, ...rest } = runner;
    await this.model.create({ _id: id, ...rest });
    return runner;
  }

  async findById(id: string): Promise<CampaignRunnerRecord | null> {
    const entity = await this.model.findById(id).lean<CampaignRunnerEntity>().exec();
    return entity ? toCampaignRunnerRecord(entity) : null;
  }

  async list({ campaignId, ownerId }: CampaignRunnerFilter, range?: Range): Promise<CampaignRunnerRecord[]> {
    const filter: FilterQuery<CampaignRunnerEntity> = {};

    if (campaignId) {
      filter.campaignId = campaignId;
    }

    if (ownerId) {
      filter.ownerId = ownerId;
    }

    const query = this.model.find(filter).sort({ createdAt: 1, _id: 1 });

    if (range) {
      query.skip(range.offset).limit(range.limit);
    }

    const entities = await query.lean<CampaignRunnerEntity[]>().exec();
    return entities.map(toCampaignRunnerRecord);
  }

  async update(id: string, patch: CampaignRunnerPatch): Promise<CampaignRunnerRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<CampaignRunnerEntity>()
      .exec();
    return entity ? toCampaignRunnerRecord(entity) : null;
  }

  async recordProgress(
    id: string,
    { distanceCovered, moneyRaised, duration }: CampaignProgress & { duration: string },
    updatedAt: Date
  ): Promise<CampaignRunnerRecord | null> {
    const entity = await this.model
      .findOneAndUpdate(
        { _id: id },
        { $inc: { distanceCovered, moneyRaised }, $set: { duration, updatedAt } },
        { new: true }
      )
      .lean<CampaignRunnerEntity>()
      .exec();
    return entity ? toCampaignRunnerRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }
}
