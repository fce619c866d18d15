import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { FilterQuery, Model } from "mongoose";
import type { CauseRunnerFilter, CauseRunnerRepository } from "../challenge.repositories";
import type { CauseRunnerRecord } from "../challenge.types";
import { CauseRunnerEntity } from "../schemas/cause-runner.schema";

const toCauseRunnerRecord = ({ _id, ...rest }: CauseRunnerEntity): CauseRunnerRecord => ({ id: _id, ...rest });

@Injectable()
export class MongoCauseRunnerRepository implements CauseRunnerRepository {
  constructor(@InjectModel(CauseRunnerEntity.name) private readonly model: Model<CauseRunnerEntity>) {}

  async create(runner: CauseRunnerRecord): Promise<CauseRunnerRecord> {
    const { id, ...rest } = runner;
    await this.model.create({ _id: id, ...rest });
    return runner;
  }

  async list({ causeId }: CauseRunnerFilter): Promise<CauseRunnerRecord[]> {
    const filter: FilterQuery<CauseRunnerEntity> = causeId ? { causeId } : {};
    const entities = await this.model.find(filter).sort({ createdAt: 1, _id: 1 }).lean<CauseRunnerEntity[]>().exec();
    return entities.map(toCauseRunnerRecord);
  }
}
