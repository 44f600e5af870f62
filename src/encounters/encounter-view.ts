import type {
  AiBehavior,
  Archetype,
  EncounterPhase,
  EncounterStatus,
  StatusEffectInstance,
} from '../db/types/index.js';
import type { StatsSnapshot } from '../engine/stats/stats.service.js';

export type CombatantView = {
  name: string;
  hp: number;
  maxHealth: number;
  defending: boolean;
  stats: StatsSnapshot;
  statuses: (StatusEffectInstance & { label: string; icon: string })[];
  statusDisplay: string;
};

export type EncounterView = {
  encounterId: string;
  questId: string;
  status: EncounterStatus;
  phase: EncounterPhase;
  round: number;
  player: CombatantView;
  enemy: CombatantView & {
    templateId: string;
    archetype: Archetype;
    behavior: AiBehavior;
  };
  abilities: { abilityId: string; name: string }[];
  log: string[];
};
