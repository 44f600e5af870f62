import { Global, Module } from '@nestjs/common';
import { GameConfigService } from './game-config.service.js';

@Global()
@Module({
  providers: [
    {
      provide: GameConfigService,
      useFactory: () => new GameConfigService(),
    },
  ],
  exports: [GameConfigService],
})
export class ConfigModule {}
