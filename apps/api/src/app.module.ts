import { Module } from "@nestjs/common";
import { APP_FILTER, APP_GUARD } from "@nestjs/core";
import { MongooseModule } from "@nestjs/mongoose";
import { AppController } from "./app.controller";
import { AuthAuditService } from "./auth/auth-audit.service";
import { AuthGuard } from "./auth/auth.guard";
import { CampaignsModule } from "./campaigns/campaigns.module";
import { ChallengesModule } from "./challenges/challenges.module";
import { ChatModule } from "./chat/chat.module";
import { CommonModule } from "./common/common.module";
import { ApiConfigService } from "./config/api.config";
import { HttpErrorFilter } from "./observability/http-error.filter";
import { PostsModule } from "./posts/posts.module";
import { UsersModule } from "./users/users.module";

@Module({
  imports: [
    CommonModule,
    MongooseModule.forRootAsync({
      imports: [CommonModule],
      inject: [ApiConfigService],
      useFactory: (config: ApiConfigService) => ({ uri: config.getMongodbUri() })
    }),
    UsersModule,
    ChallengesModule,
    CampaignsModule,
    PostsModule,
    ChatModule
  ],
  controllers: [AppController],
  providers: [
    AuthAuditService,
    {
      provide: APP_GUARD,
      useClass: AuthGuard
    },
    {
      provide: APP_FILTER,
      useClass: HttpErrorFilter
    }
  ]
})
export class AppModule {}
