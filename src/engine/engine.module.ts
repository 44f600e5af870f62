import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { StatusService } from './status/status.service.js';
import { DamageService } from './combat/damage.service.js';
import { EnemyAiService } from './combat/enemy-ai.service.js';
import { CombatService } from './combat/combat.service.js';
import { EnergyService } from './progression/energy.service.js';
import { ProgressionService } from './progression/progression.service.js';

const providers = [
  // Layer 1 — 난수
  RngService,
  // Layer 2 — 스탯
  StatsService,
  // Layer 3 — 상태이상
  StatusService,
  // Layer 4 — 전투
  DamageService,
  EnemyAiService,
  CombatService,
  // Layer 5 — 진행
  EnergyService,
  ProgressionService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
