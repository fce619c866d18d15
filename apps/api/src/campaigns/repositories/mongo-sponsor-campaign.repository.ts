import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { FilterQuery, Model } from "mongoose";
import type { PledgePatch } from "../../challenges/challenge.types";
import type { Range } from "../../common/pagination";
import type { SponsorCampaignRepository } from "../campaign.repositories";
import type { SponsorCampaignRecord } from "../campaign.types";
import { SponsorCampaignEntity } from "../schemas/sponsor-campaign.schema";

const toSponsorCampaignRecord = ({ _id, ...rest }: SponsorCampaignEntity): SponsorCampaignRecord => ({
  id: _id,
  ...rest
});

@Injectable()
export class MongoSponsorCampaignRepository implements SponsorCampaignRepository {
  constructor(@InjectModel(SponsorCampaignEntity.name) private readonly model: Model<SponsorCampaignEntity>) {}

  async create(pledge: SponsorCampaignRecord): Promise<SponsorCampaignRecord> {
    const { id, ...rest } = pledge;
    await this.model.create({ _id: id, ...rest });
    return pledge;
  }

  async findById(id: string): Promise<SponsorCampaignRecord | null> {
    const entity = await this.model.findById(id).lean<SponsorCampaignEntity>().exec();
    return entity ? toSponsorCampaignRecord(entity) : null;
  }

  async findByTargetId(campaignId: string): Promise<SponsorCampaignRecord[]> {
    const entities = await this.model
      .find({ campaignId })
      .sort({ createdAt: 1, _id: 1 })
      .lean<SponsorCampaignEntity[]>()
      .exec();
    return entities.map(toSponsorCampaignRecord);
  }

  async list(campaignId: string | undefined, { offset, limit }: Range): Promise<SponsorCampaignRecord[]> {
    const filter: FilterQuery<SponsorCampaignEntity> = campaignId ? { campaignId } : {};
    const entities = await this.model
      .find(filter)
      .sort({ createdAt: 1, _id: 1 })
      .skip(offset)
      .limit(limit)
      .lean<SponsorCampaignEntity[]>()
      .exec();
    return entities.map(toSponsorCampaignRecord);
  }

  async update(id: string, patch: PledgePatch): Promise<SponsorCampaignRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<SponsorCampaignEntity>()
      .exec();
    return entity ? toSponsorCampaignRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }
}
