import { Global, Logger, Module } from '@nestjs/common';
import { GameConfigService } from '../config/game-config.service.js';
import { DB, DrizzleModule, type DrizzleDB } from './drizzle.module.js';
import { DrizzleGameStore } from './drizzle-game.store.js';
import { GAME_STORE, type GameStore } from './game-store.js';
import { InMemoryGameStore } from './in-memory-game.store.js';

@Global()
@Module({
  imports: [DrizzleModule],
  providers: [
    {
      provide: GAME_STORE,
      inject: [GameConfigService, DB],
      useFactory: (config: GameConfigService, db: DrizzleDB): GameStore => {
        const driver = config.get().storeDriver;
        new Logger('GameStoreModule').log(`Game store driver: ${driver}`);
        return driver === 'postgres' ? new DrizzleGameStore(db) : new InMemoryGameStore();
      },
    },
  ],
  exports: [GAME_STORE],
})
export class GameStoreModule {}
