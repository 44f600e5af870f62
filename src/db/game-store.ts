// 영속화 포트 — 진행 상태 + 인카운터를 한 번에 커밋

import type { EncounterRecord, PlayerProgress } from './types/index.js';

export const GAME_STORE = Symbol('GAME_STORE');

export interface GameStoreCommit {
  progress?: PlayerProgress;
  encounter?: EncounterRecord;
  /**
   * 기존 인카운터 갱신 조건: 저장본이 ACTIVE이고 round가 이 값일 때만.
   * 없으면 새 인카운터 생성으로 취급.
   */
  expectedRound?: number;
}

export interface GameStore {
  /** 저장된 원본 레코드 (없으면 null) — 정규화는 호출자 몫 */
  loadProgress(userId: string): Promise<unknown>;
  getEncounter(encounterId: string): Promise<EncounterRecord | null>;
  getActiveEncounter(userId: string): Promise<EncounterRecord | null>;
  /** 전부 적용되거나 전부 실패. expectedRound 불일치 시 ROUND_CONFLICT */
  commit(userId: string, changes: GameStoreCommit): Promise<void>;
}
