import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { ChatMessageRepository, GroupMessageFilter } from "../chat.repositories";
import type { ChatMessagePatch, ChatMessageRecord } from "../chat.types";
import { ChatMessageEntity } from "../schemas/chat-message.schema";

const toChatMessageRecord = ({ _id, ...rest }: ChatMessageEntity): ChatMessageRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoChatMessageRepository implements ChatMessageRepository {
  constructor(@InjectModel(ChatMessageEntity.name) private readonly model: Model<ChatMessageEntity>) {}

  async create(message: ChatMessageRecord): Promise<ChatMessageRecord> {
    const { id, ...rest } = message;
    await this.model.create({ _id: id, ...rest });
    return message;
  }

  async findById(id: string): Promise<ChatMessageRecord | null> {
    const entity = await this.model.findById(id).lean<ChatMessageEntity>().exec();
    return entity ? toChatMessageRecord(entity) : null;
  }

  async update(id: string, patch: ChatMessagePatch): Promise<ChatMessageRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<ChatMessageEntity>()
      .exec();
    return entity ? toChatMessageRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async listByGroup({ groupId, senderId, offset, limit }: GroupMessageFilter): Promise<ChatMessageRecord[]> {
    const entities = await this.model
      .find(senderId ? { groupId, senderId } : { groupId })
      .sort({ createdAt: -1, _id: -1 })
      .skip(offset)
      .limit(limit)
      .lean<ChatMessageEntity[]>()
      .exec();
    return entities.map(toChatMessageRecord);
  }
}
