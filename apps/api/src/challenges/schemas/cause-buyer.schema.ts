import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "cause_buyers", versionKey: false })
export class CauseBuyerEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare buyerId: string;

  @Prop({ type: String, required: true, index: true })
  declare causeId: string;

  @Prop({ type: Number, required: true, min: 0 })
  declare amount: number;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare dateBought: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const CauseBuyerSchema = SchemaFactory.createForClass(CauseBuyerEntity);
