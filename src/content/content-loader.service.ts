// demonling_v1 JSON 로드 + 메모리 캐시

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { GameConfigService } from '../config/game-config.service.js';
import { InternalError } from '../common/errors/game-errors.js';
import type { Archetype } from '../db/types/index.js';
import { buildGameContent } from './game-content.js';
import type {
  AbilityDefinition,
  ChainDefinition,
  EnemyTemplate,
  GameContent,
  GameRules,
  PlayerAbilityDefinition,
  QuestDefinition,
} from './content.types.js';

const CONTENT_FILES = ['quests', 'enemies', 'abilities', 'rules'] as const;

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private content: GameContent | null = null;

  constructor(private readonly config: GameConfigService) {}

  async onModuleInit() {
    await this.load();
  }

  async load(): Promise<GameContent> {
    const dir = this.config.contentDir;
    const [quests, enemies, abilities, rules] = await Promise.all(
      CONTENT_FILES.map(async (name): Promise<unknown> => {
        const raw = await readFile(join(dir, `${name}.json`), 'utf-8');
        return JSON.parse(raw);
      }),
    );

    this.content = buildGameContent({ quests, enemies, abilities, rules });
    this.logger.log(
      `Content loaded from ${dir}: ${this.content.chains.length} chains, ` +
        `${this.content.quests.size} quests, ${this.content.enemies.size} enemies, ` +
        `${this.content.abilities.size} abilities`,
    );
    return this.content;
  }

  get(): GameContent {
    if (!this.content) {
      throw new InternalError('Content not loaded');
    }
    return this.content;
  }

  getRules(): Readonly<GameRules> {
    return this.get().rules;
  }

  getChains(): readonly ChainDefinition[] {
    return this.get().chains;
  }

  getQuest(id: string): Readonly<QuestDefinition> | undefined {
    return this.get().quests.get(id);
  }

  getEnemy(id: string): Readonly<EnemyTemplate> | undefined {
    return this.get().enemies.get(id);
  }

  getAbility(id: string): Readonly<AbilityDefinition> | undefined {
    return this.get().abilities.get(id);
  }

  getArchetypeAbilities(archetype: Archetype): readonly AbilityDefinition[] {
    return this.get().archetypeAbilities[archetype];
  }

  getPlayerAbilities(): readonly PlayerAbilityDefinition[] {
    return this.get().playerAbilities;
  }
}
