import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { CommentService } from "./comment.service";
import { CommentsController } from "./comments.controller";
import { COMMENT_REPOSITORY, POST_REPOSITORY } from "./post.repositories";
import { PostService } from "./post.service";
import { PostsController } from "./posts.controller";
import { MongoCommentRepository } from "./repositories/mongo-comment.repository";
import { MongoPostRepository } from "./repositories/mongo-post.repository";
import { CommentEntity, CommentSchema } from "./schemas/comment.schema";
import { PostEntity, PostSchema } from "./schemas/post.schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: PostEntity.name, schema: PostSchema },
      { name: CommentEntity.name, schema: CommentSchema }
    ])
  ],
  controllers: [PostsController, CommentsController],
  providers: [
    { provide: POST_REPOSITORY, useClass: MongoPostRepository },
    { provide: COMMENT_REPOSITORY, useClass: MongoCommentRepository },
    PostService,
    CommentService
  ]
})
export class PostsModule {}
