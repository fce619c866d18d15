import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { UserStats } from "@runfund/types";
import type { FilterQuery, Model } from "mongoose";
import { containsPattern } from "../../common/records";
import type { UserListFilter, UserRepository } from "../user.repository";
import type { UserPatch, UserRecord } from "../user.types";
import { UserEntity } from "../schemas/user.schema";

const toUserRecord = ({ _id, ...rest }: UserEntity): UserRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoUserRepository implements UserRepository {
  constructor(@InjectModel(UserEntity.name) private readonly model: Model<UserEntity>) {}

  async create(user: UserRecord): Promise<UserRecord> {
    const { id, ...rest } = user;
    await this.model.create({ _id: id, ...rest });
    return user;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const entity = await this.model.findById(id).lean<UserEntity>().exec();
    return entity ? toUserRecord(entity) : null;
  }

  async findByIds(ids: readonly string[]): Promise<UserRecord[]> {
    const entities = await this.model
      .find({ _id: { $in: [...ids] } })
      .lean<UserEntity[]>()
      .exec();
    return entities.map(toUserRecord);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const entity = await this.model.findOne({ username }).lean<UserEntity>().exec();
    return entity ? toUserRecord(entity) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const entity = await this.model.findOne({ email }).lean<UserEntity>().exec();
    return entity ? toUserRecord(entity) : null;
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const entity = await this.model
      .findOneAndUpdate({ _id: id }, { $set: patch }, { new: true })
      .lean<UserEntity>()
      .exec();
    return entity ? toUserRecord(entity) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async list({ search, offset, limit }: UserListFilter): Promise<UserRecord[]> {
    const filter: FilterQuery<UserEntity> = {};

    if (search) {
      const pattern = containsPattern(search);
      filter.$or = [{ username: pattern }, { email: pattern }, { firstName: pattern }, { lastName: pattern }];
    }

    const entities = await this.model
      .find(filter)
      .sort({ dateJoined: 1, _id: 1 })
      .skip(offset)
      .limit(limit)
      .lean<UserEntity[]>()
      .exec();
    return entities.map(toUserRecord);
  }

  async countStats(): Promise<UserStats> {
    const [total, active, staff, verified] = await Promise.all([
      this.model.countDocuments({}).exec(),
      this.model.countDocuments({ isActive: true }).exec(),
      this.model.countDocuments({ isStaff: true }).exec(),
      this.model.countDocuments({ isVerified: true }).exec()
    ]);

    return { total, active, staff, verified };
  }
}
