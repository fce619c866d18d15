import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import type { CauseBuyerRepository } from "../challenge.repositories";
import type { CauseBuyerRecord } from "../challenge.types";
import { CauseBuyerEntity } from "../schemas/cause-buyer.schema";

const toCauseBuyerRecord = ({ _id, ...rest }: CauseBuyerEntity): CauseBuyerRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCauseBuyerRepository implements CauseBuyerRepository {
  constructor(@InjectModel(CauseBuyerEntity.name) private readonly model: Model<CauseBuyerEntity>) {}

  async create(purchase: CauseBuyerRecord): Promise<CauseBuyerRecord> {
    const { id, ...rest } = purchase;
    await this.model.create({ _id: id, ...rest });
    return purchase;
  }

  async findByCauseId(causeId: string): Promise<CauseBuyerRecord[]> {
    const entities = await this.model.find({ causeId }).sort({ dateBought: 1, _id: 1 }).lean<CauseBuyerEntity[]>().exec();
    return entities.map(toCauseBuyerRecord);
  }
}
