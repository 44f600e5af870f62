import type { StatusEffectKind } from './enums.js';

/** 엔티티에 걸린 상태이상 1건. kind당 최대 1개 */
export type StatusEffectInstance = {
  kind: StatusEffectKind;
  duration: number; // 남은 턴 (소유자 턴 종료마다 -1)
  power: number;
};
