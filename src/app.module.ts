import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ConfigModule } from './config/config.module.js';
import { GameConfigService } from './config/game-config.service.js';
import { ContentModule } from './content/content.module.js';
import { GameStoreModule } from './db/game-store.module.js';
import { EncountersModule } from './encounters/encounters.module.js';
import { EngineModule } from './engine/engine.module.js';
import { PlayerModule } from './player/player.module.js';
import { QuestsModule } from './quests/quests.module.js';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      global: true,
      inject: [GameConfigService],
      useFactory: (config: GameConfigService) => ({
        secret: config.get().jwtSecret,
      }),
    }),
    GameStoreModule,
    ContentModule,
    EngineModule,
    PlayerModule,
    QuestsModule,
    EncountersModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
