import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { CommentRepository, CommentTargetFilter } from "../post.repositories";
import type { CommentPatch, CommentRecord } from "../post.types";
import { CommentEntity } from "../schemas/comment.schema";

const toCommentRecord = ({ _id, ...rest }: CommentEntity): CommentRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCommentRepository implements CommentRepository {
  constructor(@InjectModel(CommentEntity.name) private readonly model: Model<CommentEntity>) {}

  async create(comment: CommentRecord): Promise<CommentRecord> {
    const { id, ...rest } = comment;
    await this.model.create({ _id: id, ...rest });
    return comment;
  }

  async findById(id: string): Promise<CommentRecord | null> {
    const entity = await this.model.findById(id).lean<CommentEntity>().exec();
    return entity ? toCommentRecord(entity) : null;
  }

  async update(id: string, patch: CommentPatch): Promise<CommentRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<CommentEntity>()
      .exec();
    return entity ? toCommentRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async listByTarget({ targetType, targetId, offset, limit }: CommentTargetFilter): Promise<CommentRecord[]> {
    const entities = await this.model
      .find({ targetType, targetId, parentId: null })
      .sort({ createdAt: 1, _id: 1 })
      .skip(offset)
      .limit(limit)
      .lean<CommentEntity[]>()
      .exec();
    return entities.map(toCommentRecord);
  }

  async listReplies(parentId: string): Promise<CommentRecord[]> {
    const entities = await this.model.find({ parentId }).sort({ createdAt: 1, _id: 1 }).lean<CommentEntity[]>().exec();
    return entities.map(toCommentRecord);
  }
}
