// 원본 JSON → 검증된 불변 GameContent

import type { ZodType, ZodTypeDef } from 'zod';
import { InternalError } from '../common/errors/game-errors.js';
import { ARCHETYPE, type Archetype } from '../db/types/index.js';
import {
  AbilitiesFileSchema,
  EnemiesFileSchema,
  QuestsFileSchema,
  RulesFileSchema,
  type AbilityDefinition,
  type ChainDefinition,
  type EnemyTemplate,
  type GameContent,
  type QuestDefinition,
  type RawContentFiles,
} from './content.types.js';

function parseFile<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InternalError(`Invalid content file: ${file}`, {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** 참조 무결성까지 검사한 뒤 동결. 실패 시 InternalError (issues 목록 포함) */
export function buildGameContent(raw: RawContentFiles): GameContent {
  const questsFile = parseFile('quests.json', QuestsFileSchema, raw.quests);
  const enemiesFile = parseFile('enemies.json', EnemiesFileSchema, raw.enemies);
  const abilitiesFile = parseFile('abilities.json', AbilitiesFileSchema, raw.abilities);
  const rules = parseFile('rules.json', RulesFileSchema, raw.rules);

  const issues: string[] = [];

  const enemies = new Map<string, EnemyTemplate>();
  for (const enemy of enemiesFile) {
    if (enemies.has(enemy.templateId)) issues.push(`duplicate enemy: ${enemy.templateId}`);
    enemies.set(enemy.templateId, enemy);
  }

  const abilities = new Map<string, AbilityDefinition>();
  const register = (ability: AbilityDefinition) => {
    if (abilities.has(ability.abilityId)) issues.push(`duplicate ability: ${ability.abilityId}`);
    abilities.set(ability.abilityId, ability);
  };
  for (const archetype of ARCHETYPE) {
    abilitiesFile.archetypes[archetype].forEach(register);
  }
  abilitiesFile.player.forEach(register);

  const quests = new Map<string, QuestDefinition>();
  const chains: ChainDefinition[] = [];
  const chainIds = new Set<string>();
  for (const chain of questsFile.chains) {
    if (chainIds.has(chain.chainId)) issues.push(`duplicate chain: ${chain.chainId}`);
    chainIds.add(chain.chainId);

    chain.quests.forEach((quest, chainIndex) => {
      if (quests.has(quest.questId)) issues.push(`duplicate quest: ${quest.questId}`);
      if (quest.enemy && !enemies.has(quest.enemy.templateId)) {
        issues.push(`quest ${quest.questId}: unknown enemy ${quest.enemy.templateId}`);
      }
      quests.set(quest.questId, { ...quest, chainId: chain.chainId, chainIndex });
    });

    chains.push({
      chainId: chain.chainId,
      title: chain.title,
      description: chain.description,
      questIds: chain.quests.map((q) => q.questId),
    });
  }

  if (issues.length > 0) {
    throw new InternalError('Content cross-reference check failed', { issues });
  }

  const archetypeAbilities: Record<Archetype, AbilityDefinition[]> = {
    DEMON: abilitiesFile.archetypes.DEMON,
    UNDEAD: abilitiesFile.archetypes.UNDEAD,
    BEAST: abilitiesFile.archetypes.BEAST,
    ELEMENTAL: abilitiesFile.archetypes.ELEMENTAL,
  };

  const content: GameContent = {
    rules,
    chains,
    quests,
    enemies,
    archetypeAbilities,
    playerAbilities: [...abilitiesFile.player].sort((a, b) => a.unlockLevel - b.unlockLevel),
    abilities,
  };

  // Map 자체는 freeze 대상이 아님 — ReadonlyMap 타입으로만 노출
  deepFreeze(rules);
  deepFreeze(chains);
  deepFreeze(archetypeAbilities);
  deepFreeze(content.playerAbilities);
  for (const quest of quests.values()) deepFreeze(quest);
  for (const enemy of enemies.values()) deepFreeze(enemy);
  return Object.freeze(content);
}
