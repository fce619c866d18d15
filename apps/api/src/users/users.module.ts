import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { MongoUserRepository } from "./repositories/mongo-user.repository";
import { UserEntity, UserSchema } from "./schemas/user.schema";
import { USER_REPOSITORY } from "./user.repository";
import { UserService } from "./user.service";
import { UsersController } from "./users.controller";

@Module({
  imports: [MongooseModule.forFeature([{ name: UserEntity.name, schema: UserSchema }])],
  controllers: [UsersController],
  providers: [{ provide: USER_REPOSITORY, useClass: MongoUserRepository }, UserService],
  exports: [UserService]
})
export class UsersModule {}
