import { ProgressionService } from './progression.service.js';
import { EnergyService } from './energy.service.js';
import { StatsService } from '../stats/stats.service.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { GameError } from '../../common/errors/game-errors.js';
import { DEFAULT_PLAYER_PROGRESS, type PlayerProgress } from '../../db/types/index.js';

const NOW = 1_700_000_000_000;
const MINUTE = 60_000;

function makeProgress(overrides: Partial<PlayerProgress> = {}): PlayerProgress {
  return {
    ...DEFAULT_PLAYER_PROGRESS,
    baseStats: { ...DEFAULT_PLAYER_PROGRESS.baseStats },
    completedQuestIds: [],
    unlockedFeatures: [],
    lastEnergyTimestamp: NOW,
    ...overrides,
  };
}

function captureError(fn: () => unknown): GameError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GameError) return err;
    throw err;
  }
  throw new Error('expected GameError');
}

describe('ProgressionService', () => {
  let content: ContentLoaderService;
  let service: ProgressionService;

  beforeAll(async () => {
    content = new ContentLoaderService(new GameConfigService());
    await content.load();
  });

  beforeEach(() => {
    service = new ProgressionService(
      content,
      new EnergyService(),
      new StatsService(),
      new GameConfigService({ allowTestRefill: true }),
    );
  });

  describe('normalize', () => {
    it('레코드 없음 → 기본값 전체', () => {
      expect(service.normalize(undefined, NOW)).toEqual({
        level: 1,
        xp: 0,
        xpToNext: 10,
        gold: 100,
        soulShards: 0,
        energy: 10,
        energyMax: 10,
        lastEnergyTimestamp: NOW,
        completedQuestIds: [],
        baseStats: { maxHealth: 20, attack: 5, defense: 3, agility: 4, magic: 2 },
        unlockedFeatures: [],
      });
    });

    it('필드 단위 대체: 손상된 필드만 기본값', () => {
      const progress = service.normalize(
        {
          level: 4,
          xp: 'lots',
          gold: -5,
          completedQuestIds: ['ash_bone_01', 'ash_bone_01', 7],
          baseStats: { attack: 9 },
        },
        NOW,
      );
      expect(progress.level).toBe(4);
      expect(progress.xp).toBe(0);
      expect(progress.gold).toBe(100);
      expect(progress.completedQuestIds).toEqual([]);
      expect(progress.baseStats).toEqual({ maxHealth: 20, attack: 9, defense: 3, agility: 4, magic: 2 });
    });

    it('중복 완료 id 제거, 에너지는 최대치로 clamp', () => {
      const progress = service.normalize(
        { completedQuestIds: ['ash_bone_01', 'ash_bone_01'], energy: 50, energyMax: 12 },
        NOW,
      );
      expect(progress.completedQuestIds).toEqual(['ash_bone_01']);
      expect(progress.energy).toBe(12);
    });
  });

  describe('applyXp — 레벨업', () => {
    it('xp 8/10 + 5 → 레벨 2, xp 3, 다음 15', () => {
      const { progress, levelsGained } = service.applyXp(makeProgress({ xp: 8 }), 5);
      expect(progress.level).toBe(2);
      expect(progress.xp).toBe(3);
      expect(progress.xpToNext).toBe(15);
      expect(levelsGained).toBe(1);
      expect(progress.baseStats).toEqual({ maxHealth: 25, attack: 7, defense: 4, agility: 5, magic: 3 });
    });

    it('한 번에 여러 레벨: 0 + 40 → 10, 15 소모 후 레벨 3, xp 15, 다음 22', () => {
      const { progress, levelsGained } = service.applyXp(makeProgress(), 40);
      expect(levelsGained).toBe(2);
      expect(progress.level).toBe(3);
      expect(progress.xp).toBe(15);
      expect(progress.xpToNext).toBe(22);
    });
  });

  describe('isEligible', () => {
    it('체인 첫 퀘스트는 항상 가능', () => {
      expect(service.isEligible(makeProgress(), 'ash_bone_01')).toBe(true);
      expect(service.isEligible(makeProgress(), 'blood_iron_01')).toBe(true);
    });

    it('직전 퀘스트 미완료면 불가', () => {
      expect(service.isEligible(makeProgress(), 'ash_bone_02')).toBe(false);
      expect(
        service.isEligible(makeProgress({ completedQuestIds: ['ash_bone_01'] }), 'ash_bone_02'),
      ).toBe(true);
      expect(
        service.isEligible(makeProgress({ completedQuestIds: ['ash_bone_01'] }), 'ash_bone_03'),
      ).toBe(false);
    });

    it('알 수 없는 퀘스트 → false', () => {
      expect(service.isEligible(makeProgress(), 'nope')).toBe(false);
    });
  });

  describe('startQuest', () => {
    it('에너지 차감 + 전투 퀘스트', () => {
      const input = makeProgress({ energy: 5 });
      const result = service.startQuest(input, 'ash_bone_01', NOW);
      expect(result.kind).toBe('COMBAT');
      expect(result.progress.energy).toBe(4);
      expect(input.energy).toBe(5);
    });

    it('적이 없는 퀘스트 → NARRATIVE', () => {
      expect(service.startQuest(makeProgress(), 'blood_iron_01', NOW).kind).toBe('NARRATIVE');
    });

    it('시작 전에 에너지 재계산', () => {
      const input = makeProgress({ energy: 0, lastEnergyTimestamp: NOW - 3 * MINUTE });
      const result = service.startQuest(input, 'ash_bone_01', NOW);
      expect(result.progress.energy).toBe(2);
    });

    it('에너지 부족 → INSUFFICIENT_ENERGY, 입력 불변', () => {
      const input = makeProgress({ energy: 0 });
      const err = captureError(() => service.startQuest(input, 'ash_bone_01', NOW));
      expect(err.code).toBe('INSUFFICIENT_ENERGY');
      expect(err.details).toEqual({ required: 1, available: 0 });
      expect(input.energy).toBe(0);
    });

    it('선행 미완료 → INVALID_QUEST', () => {
      const input = makeProgress();
      expect(captureError(() => service.startQuest(input, 'ash_bone_02', NOW)).code).toBe(
        'INVALID_QUEST',
      );
      expect(input.energy).toBe(10);
    });

    it('알 수 없는 퀘스트 → INVALID_QUEST', () => {
      expect(captureError(() => service.startQuest(makeProgress(), 'nope', NOW)).code).toBe(
        'INVALID_QUEST',
      );
    });
  });

  describe('complete', () => {
    it('첫 클리어: xp, 골드, 영혼 파편, 완료 목록', () => {
      const { progress, summary } = service.complete(makeProgress(), 'ash_bone_01', 'VICTORY');
      expect(progress.level).toBe(2);
      expect(progress.xp).toBe(0);
      expect(progress.gold).toBe(105);
      expect(progress.soulShards).toBe(1);
      expect(progress.completedQuestIds).toEqual(['ash_bone_01']);
      expect(summary).toEqual({
        questId: 'ash_bone_01',
        resolution: 'VICTORY',
        rewarded: true,
        firstClear: true,
        xpGained: 10,
        goldGained: 5,
        soulShardsGained: 1,
        levelsGained: 1,
        level: 2,
        unlockedFeature: null,
      });
    });

    it('같은 퀘스트 두 번 → 영혼 파편은 한 번만, 완료 목록 멱등', () => {
      const first = service.complete(makeProgress(), 'ash_bone_01', 'VICTORY').progress;
      const second = service.complete(first, 'ash_bone_01', 'VICTORY');
      expect(second.progress.soulShards).toBe(1);
      expect(second.progress.gold).toBe(110);
      expect(second.progress.completedQuestIds).toEqual(['ash_bone_01']);
      expect(second.summary.firstClear).toBe(false);
      expect(second.summary.soulShardsGained).toBe(0);
    });

    it('보스 퀘스트 → 파편 3개 + minions 해금', () => {
      const done = ['ash_bone_01', 'ash_bone_02', 'ash_bone_03', 'ash_bone_04'];
      const { progress, summary } = service.complete(
        makeProgress({ completedQuestIds: done }),
        'ash_bone_05',
        'VICTORY',
      );
      expect(progress.soulShards).toBe(3);
      expect(progress.unlockedFeatures).toEqual(['minions']);
      expect(summary.unlockedFeature).toBe('minions');
    });

    it('DEFEAT → 보상 없음, 입력 그대로', () => {
      const input = makeProgress();
      const { progress, summary } = service.complete(input, 'ash_bone_01', 'DEFEAT');
      expect(progress).toBe(input);
      expect(summary.rewarded).toBe(false);
      expect(progress.completedQuestIds).toEqual([]);
    });
  });

  describe('에너지 충전', () => {
    it('테스트 충전 → 최대치', () => {
      const progress = service.refillEnergyForTesting(makeProgress({ energy: 1 }), NOW + 5);
      expect(progress.energy).toBe(10);
      expect(progress.lastEnergyTimestamp).toBe(NOW + 5);
    });

    it('테스트 충전 비활성 → FORBIDDEN', () => {
      const locked = new ProgressionService(
        content,
        new EnergyService(),
        new StatsService(),
        new GameConfigService({ allowTestRefill: false }),
      );
      expect(captureError(() => locked.refillEnergyForTesting(makeProgress(), NOW)).code).toBe(
        'FORBIDDEN',
      );
    });

    it('영혼 파편 5개 → 가득 충전', () => {
      const progress = service.refillEnergyWithSoulShards(
        makeProgress({ energy: 2, soulShards: 7 }),
        NOW,
      );
      expect(progress.energy).toBe(10);
      expect(progress.soulShards).toBe(2);
    });

    it('파편 부족 → INSUFFICIENT_SOUL_SHARDS', () => {
      const err = captureError(() =>
        service.refillEnergyWithSoulShards(makeProgress({ energy: 2, soulShards: 4 }), NOW),
      );
      expect(err.code).toBe('INSUFFICIENT_SOUL_SHARDS');
      expect(err.details).toEqual({ required: 5, available: 4 });
    });

    it('이미 가득 → INVALID_INPUT', () => {
      expect(
        captureError(() => service.refillEnergyWithSoulShards(makeProgress({ soulShards: 9 }), NOW))
          .code,
      ).toBe('INVALID_INPUT');
    });
  });

  describe('availableAbilities', () => {
    it('레벨별 해금', () => {
      const ids = (level: number) =>
        service.availableAbilities(makeProgress({ level })).map((a) => a.abilityId);
      expect(ids(1)).toEqual(['fire_eruption']);
      expect(ids(5)).toEqual(['fire_eruption', 'dark_mending']);
      expect(ids(10)).toEqual(['fire_eruption', 'dark_mending', 'infernal_roar']);
    });
  });

  describe('questBoard', () => {
    it('체인별 상태', () => {
      const board = service.questBoard(makeProgress({ completedQuestIds: ['ash_bone_01'] }));
      const ashBone = board.find((c) => c.chainId === 'ash_bone');
      expect(ashBone?.quests.map((q) => q.status)).toEqual([
        'COMPLETED',
        'UNLOCKED',
        'LOCKED',
        'LOCKED',
        'LOCKED',
      ]);
      const bloodIron = board.find((c) => c.chainId === 'blood_iron');
      expect(bloodIron?.quests[0]).toMatchObject({ status: 'UNLOCKED', kind: 'NARRATIVE', enemy: null });
      expect(bloodIron?.quests[1].enemy).toEqual({ name: 'Level 2 Iron Guardian', level: 2 });
    });
  });

  describe('scaleEnemy', () => {
    it('레벨 1 → 템플릿 그대로', () => {
      const enemy = service.scaleEnemy('lesser_imp', 1);
      expect(enemy.name).toBe('Lesser Imp');
      expect(enemy.stats).toEqual({ maxHealth: 15, attack: 3, defense: 1, agility: 2, magic: 1 });
    });

    it('레벨 3 → +2레벨분 성장', () => {
      const enemy = service.scaleEnemy('grave_knight', 3);
      expect(enemy.name).toBe('Level 3 Grave Knight');
      expect(enemy.stats).toEqual({ maxHealth: 80, attack: 16, defense: 9, agility: 5, magic: 6 });
    });

    it('알 수 없는 템플릿 → INVALID_QUEST', () => {
      expect(captureError(() => service.scaleEnemy('nope', 1)).code).toBe('INVALID_QUEST');
    });
  });
});
