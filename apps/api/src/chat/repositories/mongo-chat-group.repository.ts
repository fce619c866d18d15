import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import { containsPattern } from "../../common/records";
import { GROUP_SEARCH_LIMIT, type ChatGroupRepository, type MemberGroupFilter } from "../chat.repositories";
import type { ChatGroupPatch, ChatGroupRecord } from "../chat.types";
import { ChatGroupEntity } from "../schemas/chat-group.schema";

const toChatGroupRecord = ({ _id, ...rest }: ChatGroupEntity): ChatGroupRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoChatGroupRepository implements ChatGroupRepository {
  constructor(@InjectModel(ChatGroupEntity.name) private readonly model: Model<ChatGroupEntity>) {}

  async create(group: ChatGroupRecord): Promise<ChatGroupRecord> {
    const { id, ...rest } = group;
    await this.model.create({ _id: id, ...rest });
    return group;
  }

  async findById(id: string): Promise<ChatGroupRecord | null> {
    const entity = await this.model.findById(id).lean<ChatGroupEntity>().exec();
    return entity ? toChatGroupRecord(entity) : null;
  }

  async findBySlug(slug: string): Promise<ChatGroupRecord | null> {
    const entity = await this.model.findOne({ slug }).lean<ChatGroupEntity>().exec();
    return entity ? toChatGroupRecord(entity) : null;
  }

  async update(id: string, patch: ChatGroupPatch): Promise<ChatGroupRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<ChatGroupEntity>()
      .exec();
    return entity ? toChatGroupRecord(entity) : null;
  }

  async addMember(id: string, userId: string, updatedAt: Date): Promise<ChatGroupRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $addToSet: { members: userId }, $set: { updatedAt } }, { new: true })
      .lean<ChatGroupEntity>()
      .exec();
    return entity ? toChatGroupRecord(entity) : null;
  }

  async removeMember(id: string, userId: string, updatedAt: Date): Promise<ChatGroupRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $pull: { members: userId }, $set: { updatedAt } }, { new: true })
      .lean<ChatGroupEntity>()
      .exec();
    return entity ? toChatGroupRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async listForMember({ userId, offset, limit }: MemberGroupFilter): Promise<ChatGroupRecord[]> {
    const entities = await this.model
      .find({ members: userId })
      .sort({ createdAt: -1, _id: -1 })
      .skip(offset)
      .limit(limit)
      .lean<ChatGroupEntity[]>()
      .exec();
    return entities.map(toChatGroupRecord);
  }

  async searchByName(query: string): Promise<ChatGroupRecord[]> {
    const entities = await this.model
      .find({ name: containsPattern(query) })
      .sort({ name: 1 })
      .limit(GROUP_SEARCH_LIMIT)
      .lean<ChatGroupEntity[]>()
      .exec();
    return entities.map(toChatGroupRecord);
  }
}
