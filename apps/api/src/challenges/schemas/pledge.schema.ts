import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

class PledgeFields {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare sponsorId: string;

  @Prop({ type: Number, required: true, min: 0 })
  declare distance: number;

  @Prop({ type: Number, required: true, min: 0 })
  declare amountPerKm: number;

  @Prop({ type: Number, required: true, min: 0 })
  declare totalAmount: number;

  @Prop({ type: String, default: "" })
  declare brandImg: string;

  @Prop({ type: String, default: "" })
  declare videoUrl: string;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

@Schema({ collection: "sponsor_challenges", versionKey: false })
export class SponsorChallengeEntity extends PledgeFields {
  @Prop({ type: String, required: true, index: true })
  declare challengeId: string;
}

@Schema({ collection: "sponsor_causes", versionKey: false })
export class SponsorCauseEntity extends PledgeFields {
  @Prop({ type: String, required: true, index: true })
  declare causeId: string;
}

export const SponsorChallengeSchema = SchemaFactory.createForClass(SponsorChallengeEntity);
export const SponsorCauseSchema = SchemaFactory.createForClass(SponsorCauseEntity);
