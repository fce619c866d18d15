import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "posts", versionKey: false })
export class PostEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare authorId: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 200 })
  declare title: string;

  @Prop({ type: String, required: true, unique: true })
  declare slug: string;

  @Prop({ type: String, required: true })
  declare content: string;

  @Prop({ type: String, default: "" })
  declare coverImageUrl: string;

  @Prop({ type: Boolean, default: false })
  declare isPublished: boolean;

  @Prop({ type: SchemaTypes.Date, default: null })
  declare publishedAt: Date | null;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const PostSchema = SchemaFactory.createForClass(PostEntity);

PostSchema.index({ isPublished: 1, publishedAt: -1 });
