// 게임 서버 설정 — 환경변수 + 기본값

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { STORE_DRIVER, type StoreDriver } from '../db/types/index.js';

export interface GameConfig {
  production: boolean;
  port: number;
  storeDriver: StoreDriver;
  databaseUrl: string;
  contentDir: string;
  jwtSecret: string;
  allowTestRefill: boolean;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function parseDriver(raw: string | undefined, databaseUrl: string): StoreDriver {
  const driver = STORE_DRIVER.find((d) => d === raw);
  if (driver) return driver;
  return databaseUrl ? 'postgres' : 'memory';
}

export function loadGameConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const production = env.NODE_ENV === 'production';
  const databaseUrl = env.DATABASE_URL ?? '';
  return {
    production,
    port: parseInt(env.PORT ?? '3000', 10),
    storeDriver: parseDriver(env.GAME_STORE, databaseUrl),
    databaseUrl,
    contentDir: env.CONTENT_DIR ?? join(process.cwd(), 'content', 'demonling_v1'),
    jwtSecret: env.JWT_SECRET ?? 'dev-secret',
    allowTestRefill: parseBool(env.GAME_ALLOW_TEST_REFILL, !production),
  };
}

@Injectable()
export class GameConfigService {
  private readonly logger = new Logger(GameConfigService.name);
  private readonly config: GameConfig;

  constructor(config?: Partial<GameConfig>) {
    this.config = { ...loadGameConfig(), ...config };
    if (this.config.storeDriver === 'postgres' && !this.config.databaseUrl) {
      this.logger.warn('GAME_STORE=postgres but DATABASE_URL is empty');
    }
  }

  get(): GameConfig {
    return this.config;
  }

  get contentDir(): string {
    return this.config.contentDir;
  }

  get allowTestRefill(): boolean {
    return this.config.allowTestRefill;
  }
}
