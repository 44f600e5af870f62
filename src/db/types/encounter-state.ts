import type {
  AiBehavior,
  Archetype,
  CombatEventKind,
  EncounterPhase,
  EncounterStatus,
} from './enums.js';
import type { BaseStats } from './base-stats.js';
import type { StatusEffectInstance } from './status-effect.js';

export type CombatantState = {
  id: 'player' | 'enemy';
  name: string;
  stats: BaseStats;
  hp: number;
  statuses: StatusEffectInstance[];
  defending: boolean;
};

export type EnemyCombatantState = CombatantState & {
  id: 'enemy';
  templateId: string;
  archetype: Archetype;
  behavior: AiBehavior;
  abilityIds: string[];
};

export type EncounterStateV1 = {
  version: 'encounter_state_v1';
  encounterId: string;
  questId: string;
  phase: EncounterPhase;
  round: number;
  rng: {
    seed: string;
    cursor: number;
  };
  player: CombatantState;
  enemy: EnemyCombatantState;
  playerAbilityIds: string[];
  log: string[];
};

export type CombatAction =
  | { type: 'ATTACK' }
  | { type: 'DEFEND' }
  | { type: 'SPECIAL'; abilityId: string };

export type CombatEvent = {
  kind: CombatEventKind;
  text: string;
  tags: string[];
  data?: Record<string, unknown>;
};

export type EncounterRecord = {
  encounterId: string;
  userId: string;
  questId: string;
  status: EncounterStatus;
  state: EncounterStateV1;
};
