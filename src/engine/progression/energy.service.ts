// 에너지 시계 — 경과 시간의 순수 함수 (백그라운드 틱 없음)

import { Injectable } from '@nestjs/common';

export interface EnergyClock {
  energy: number;
  energyMax: number;
  lastEnergyTimestamp: number;
}

export interface RegenResult<T extends EnergyClock> {
  state: T;
  gained: number;
}

@Injectable()
export class EnergyService {
  /**
   * 마지막 갱신 이후 경과한 interval 개수만큼 충전 (최대치 상한).
   * 타임스탬프는 interval 단위로만 전진 → 같은 interval 안의 반복 호출은 중복 충전 없음.
   * 최대치면 타임스탬프를 now로 (적립 없음). 시계가 거꾸로 가면 충전 없이 now로 재설정.
   */
  regenerate<T extends EnergyClock>(state: T, now: number, intervalMs: number): RegenResult<T> {
    const energy = Math.max(0, Math.min(state.energy, state.energyMax));

    if (now < state.lastEnergyTimestamp || energy >= state.energyMax) {
      return { state: { ...state, energy, lastEnergyTimestamp: now }, gained: 0 };
    }

    const intervals = Math.floor((now - state.lastEnergyTimestamp) / intervalMs);
    if (intervals <= 0) {
      return { state: { ...state, energy }, gained: 0 };
    }

    const gained = Math.min(intervals, state.energyMax - energy);
    const nextEnergy = energy + gained;
    const lastEnergyTimestamp =
      nextEnergy >= state.energyMax ? now : state.lastEnergyTimestamp + intervals * intervalMs;

    return { state: { ...state, energy: nextEnergy, lastEnergyTimestamp }, gained };
  }

  /** 다음 1포인트 충전까지 남은 ms (최대치면 null) */
  msUntilNext(state: EnergyClock, now: number, intervalMs: number): number | null {
    if (state.energy >= state.energyMax) return null;
    const elapsed = Math.max(0, now - state.lastEnergyTimestamp);
    return intervalMs - (elapsed % intervalMs);
  }
}
