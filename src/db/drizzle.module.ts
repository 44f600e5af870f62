import { Global, Module } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { GameConfigService } from '../config/game-config.service.js';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

@Global()
@Module({
  providers: [
    {
      provide: DB,
      inject: [GameConfigService],
      useFactory: (config: GameConfigService) => {
        // Pool은 첫 쿼리 시점에 연결
        const pool = new Pool({
          connectionString: config.get().databaseUrl,
        });
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DB],
})
export class DrizzleModule {}
