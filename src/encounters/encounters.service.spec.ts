import { EncountersService } from './encounters.service.js';
import { InMemoryGameStore } from '../db/in-memory-game.store.js';
import { GameConfigService } from '../config/game-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { CombatService } from '../engine/combat/combat.service.js';
import { DamageService } from '../engine/combat/damage.service.js';
import { EnemyAiService } from '../engine/combat/enemy-ai.service.js';
import { EnergyService } from '../engine/progression/energy.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { StatsService } from '../engine/stats/stats.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { PlayerService } from '../player/player.service.js';
import { GameError } from '../common/errors/game-errors.js';
import {
  DEFAULT_BASE_STATS,
  type EncounterRecord,
  type EncounterStateV1,
} from '../db/types/index.js';

const NOW = 1_700_000_000_000;
const USER = 'user-1';
const ENCOUNTER_ID = 'enc-1';

async function captureError(fn: () => Promise<unknown>): Promise<GameError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof GameError) return err;
    throw err;
  }
  throw new Error('expected GameError');
}

describe('EncountersService', () => {
  let content: ContentLoaderService;
  let store: InMemoryGameStore;
  let ai: EnemyAiService;
  let combat: CombatService;
  let service: EncountersService;

  beforeAll(async () => {
    content = new ContentLoaderService(new GameConfigService());
    await content.load();
  });

  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    store = new InMemoryGameStore();
    ai = new EnemyAiService();

    const config = new GameConfigService({ allowTestRefill: true });
    const stats = new StatsService();
    const status = new StatusService();
    const energy = new EnergyService();
    const progression = new ProgressionService(content, energy, stats, config);
    combat = new CombatService(new RngService(), stats, status, new DamageService(), ai);
    const players = new PlayerService(store, progression, energy, content);
    service = new EncountersService(store, combat, progression, stats, status, content, players);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function seedEncounter(
    mutate: (state: EncounterStateV1) => void = () => undefined,
  ): Promise<EncounterRecord> {
    const state = combat.createEncounter({
      encounterId: ENCOUNTER_ID,
      questId: 'ash_bone_01',
      seed: 'test-seed',
      player: { name: 'Demonling', stats: { ...DEFAULT_BASE_STATS } },
      enemy: {
        templateId: 'lesser_imp',
        name: 'Lesser Imp',
        archetype: 'DEMON',
        behavior: 'BALANCED',
        stats: { maxHealth: 15, attack: 3, defense: 1, agility: 2, magic: 1 },
        abilityIds: ['hellfire', 'dark_curse', 'demonic_fury'],
      },
      playerAbilityIds: ['fire_eruption'],
    });
    mutate(state);
    const record: EncounterRecord = {
      encounterId: ENCOUNTER_ID,
      userId: USER,
      questId: 'ash_bone_01',
      status: 'ACTIVE',
      state,
    };
    await store.commit(USER, { encounter: record });
    return record;
  }

  describe('조회', () => {
    it('진행 중인 인카운터가 없으면 null', async () => {
      expect(await service.getActiveEncounter(USER)).toBeNull();
    });

    it('유효 스탯과 상태이상 표시를 포함한 뷰', async () => {
      await seedEncounter((state) => {
        state.player.statuses.push({ kind: 'WEAKENED', duration: 2, power: 4 });
      });

      const view = await service.getEncounter(USER, ENCOUNTER_ID);

      expect(view.player.statuses).toEqual([
        { kind: 'WEAKENED', duration: 2, power: 4, label: 'Weakened', icon: expect.any(String) },
      ]);
      expect(view.player.statusDisplay).toBe(`${view.player.statuses[0].icon}(2)`);
      expect(view.enemy.stats).toEqual({
        maxHealth: 15,
        attack: 3,
        defense: 1,
        agility: 2,
        magic: 1,
        damagePercent: 100,
        incomingReduction: 0,
      });
      expect(await service.getActiveEncounter(USER)).toEqual(view);
    });

    it('없는 인카운터 → NOT_FOUND', async () => {
      const err = await captureError(() => service.getEncounter(USER, 'missing'));
      expect(err.code).toBe('NOT_FOUND');
    });

    it('다른 플레이어의 인카운터 → FORBIDDEN', async () => {
      await seedEncounter();
      const err = await captureError(() => service.getEncounter('user-2', ENCOUNTER_ID));
      expect(err.code).toBe('FORBIDDEN');
    });
  });

  describe('submitAction', () => {
    it('진행 중 라운드는 인카운터만 저장', async () => {
      await seedEncounter();
      jest.spyOn(ai, 'chooseAction').mockReturnValue({ type: 'DEFEND' });

      const result = await service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' });

      expect(result.outcome).toBe('ONGOING');
      expect(result.completion).toBeNull();
      expect(result.progress).toBeNull();
      expect(result.encounter.round).toBe(2);
      expect(result.encounter.enemy.hp).toBeLessThan(15);
      expect(result.encounter.enemy.defending).toBe(true);

      const stored = await store.getEncounter(ENCOUNTER_ID);
      expect(stored?.status).toBe('ACTIVE');
      expect(stored?.state.round).toBe(2);
      expect(await store.loadProgress(USER)).toBeNull();
    });

    it('승리: 인카운터 결과와 보상을 함께 저장', async () => {
      await seedEncounter((state) => {
        state.enemy.hp = 1;
      });

      const result = await service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' });

      expect(result.outcome).toBe('VICTORY');
      expect(result.encounter.status).toBe('VICTORY');
      expect(result.encounter.log.at(-1)).toBe('Victory! Lesser Imp is defeated!');
      expect(result.completion).toMatchObject({
        resolution: 'VICTORY',
        rewarded: true,
        firstClear: true,
        xpGained: 10,
        goldGained: 5,
        soulShardsGained: 1,
        levelsGained: 1,
        level: 2,
      });
      expect(result.progress).toMatchObject({
        level: 2,
        xp: 0,
        xpToNext: 15,
        gold: 105,
        soulShards: 1,
        completedQuestIds: ['ash_bone_01'],
        baseStats: { maxHealth: 25, attack: 7, defense: 4, agility: 5, magic: 3 },
      });

      expect(await store.loadProgress(USER)).toEqual(result.progress);
      expect((await store.getEncounter(ENCOUNTER_ID))?.status).toBe('VICTORY');
      expect(await store.getActiveEncounter(USER)).toBeNull();
    });

    it('패배: 보상 없이 종료', async () => {
      await seedEncounter((state) => {
        state.player.hp = 1;
      });
      jest.spyOn(ai, 'chooseAction').mockReturnValue({ type: 'ATTACK' });

      const result = await service.submitAction(USER, ENCOUNTER_ID, { type: 'DEFEND' });

      expect(result.outcome).toBe('DEFEAT');
      expect(result.encounter.log.at(-1)).toBe('Defeat! Demonling has fallen...');
      expect(result.completion).toMatchObject({ resolution: 'DEFEAT', rewarded: false, xpGained: 0 });
      expect(result.progress).toMatchObject({ level: 1, gold: 100, completedQuestIds: [] });
      expect((await store.getEncounter(ENCOUNTER_ID))?.status).toBe('DEFEAT');
    });

    it('같은 라운드 동시 제출: 하나만 반영, 보상은 한 번', async () => {
      await seedEncounter((state) => {
        state.enemy.hp = 1;
      });

      const results = await Promise.allSettled([
        service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' }),
        service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' }),
      ]);

      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(GameError);
      expect(rejected[0].reason).toMatchObject({ code: 'ROUND_CONFLICT' });
      expect(await store.loadProgress(USER)).toMatchObject({ gold: 105, soulShards: 1, level: 2 });
    });

    it('expectedRound 불일치 → ROUND_CONFLICT, 상태 불변', async () => {
      const seeded = await seedEncounter();

      const err = await captureError(() =>
        service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK', expectedRound: 3 }),
      );

      expect(err.code).toBe('ROUND_CONFLICT');
      expect(err.details).toEqual({ encounterId: ENCOUNTER_ID, expectedRound: 3, round: 1 });
      expect(await store.getEncounter(ENCOUNTER_ID)).toEqual(seeded);
    });

    it('expectedRound 일치 → 정상 진행', async () => {
      await seedEncounter();
      jest.spyOn(ai, 'chooseAction').mockReturnValue({ type: 'DEFEND' });

      const result = await service.submitAction(USER, ENCOUNTER_ID, {
        type: 'DEFEND',
        expectedRound: 1,
      });

      expect(result.outcome).toBe('ONGOING');
      expect(result.encounter.round).toBe(2);
    });

    it('종료된 인카운터 → ENCOUNTER_ENDED', async () => {
      await seedEncounter((state) => {
        state.enemy.hp = 1;
      });
      await service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' });

      const err = await captureError(() =>
        service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' }),
      );
      expect(err.code).toBe('ENCOUNTER_ENDED');
    });

    it('해금되지 않은 특수기 → ABILITY_UNAVAILABLE, 상태 불변', async () => {
      const seeded = await seedEncounter();

      const err = await captureError(() =>
        service.submitAction(USER, ENCOUNTER_ID, { type: 'SPECIAL', abilityId: 'dark_mending' }),
      );

      expect(err.code).toBe('ABILITY_UNAVAILABLE');
      expect(await store.getEncounter(ENCOUNTER_ID)).toEqual(seeded);
    });

    it('종료 커밋 실패 시 저장 상태 불변', async () => {
      const seeded = await seedEncounter((state) => {
        state.enemy.hp = 1;
      });
      jest.spyOn(store, 'commit').mockRejectedValueOnce(new Error('db down'));

      await expect(
        service.submitAction(USER, ENCOUNTER_ID, { type: 'ATTACK' }),
      ).rejects.toThrow('db down');

      expect(await store.getEncounter(ENCOUNTER_ID)).toEqual(seeded);
      expect(await store.loadProgress(USER)).toBeNull();
    });
  });
});
