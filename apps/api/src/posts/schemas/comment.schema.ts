import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "comments", versionKey: false })
export class CommentEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare authorId: string;

  @Prop({ type: String, required: true })
  declare targetType: string;

  @Prop({ type: String, required: true })
  declare targetId: string;

  @Prop({ type: String, default: null, index: true })
  declare parentId: string | null;

  @Prop({ type: String, required: true, maxlength: 2000 })
  declare content: string;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const CommentSchema = SchemaFactory.createForClass(CommentEntity);

CommentSchema.index({ targetType: 1, targetId: 1, parentId: 1, createdAt: 1 });
