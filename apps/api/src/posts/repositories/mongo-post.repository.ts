import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { FilterQuery, Model } from "mongoose";
import { containsPattern } from "../../common/records";
import type { PostRepository, PublishedPostFilter } from "../post.repositories";
import type { PostPatch, PostRecord } from "../post.types";
import { PostEntity } from "../schemas/post.schema";

const toPostRecord = ({ _id, ...rest }: PostEntity): PostRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoPostRepository implements PostRepository {
  constructor(@InjectModel(PostEntity.name) private readonly model: Model<PostEntity>) {}

  async create(post: PostRecord): Promise<PostRecord> {
    const { id, ...rest } = post;
    await this.model.create({ _id: id, ...rest });
    return post;
  }

  async findById(id: string): Promise<PostRecord | null> {
    const entity = await this.model.findById(id).lean<PostEntity>().exec();
    return entity ? toPostRecord(entity) : null;
  }

  async findBySlug(slug: string): Promise<PostRecord | null> {
    const entity = await this.model.findOne({ slug }).lean<PostEntity>().exec();
    return entity ? toPostRecord(entity) : null;
  }

  async update(id: string, patch: PostPatch): Promise<PostRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<PostEntity>()
      .exec();
    return entity ? toPostRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async listPublished({ search, offset, limit }: PublishedPostFilter): Promise<PostRecord[]> {
    const filter: FilterQuery<PostEntity> = { isPublished: true };

    if (search) {
      const pattern = containsPattern(search);
      filter.$or = [{ title: pattern }, { content: pattern }];
    }

    const entities = await this.model
      .find(filter)
      .sort({ publishedAt: -1, _id: -1 })
      .skip(offset)
      .limit(limit)
      .lean<PostEntity[]>()
      .exec();
    return entities.map(toPostRecord);
  }

  async listByAuthor(authorId: string): Promise<PostRecord[]> {
    const entities = await this.model.find({ authorId }).sort({ createdAt: -1 }).lean<PostEntity[]>().exec();
    return entities.map(toPostRecord);
  }
}
