// splitmix64 기반 결정적 RNG — 인카운터 seed + cursor로 재현 가능

import { Injectable } from '@nestjs/common';

export interface RngState {
  seed: string;
  cursor: number;
}

/** 적 AI 등이 소비하는 최소 난수 인터페이스 (테스트에서 스크립트 주입) */
export interface RandomSource {
  /** 0.0 이상 1.0 미만 */
  next(): number;
  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number;
}

const MASK_64 = 0xffffffffffffffffn;
const TWO_POW_53 = 2 ** 53;

export class Rng implements RandomSource {
  private state: bigint;
  private _cursor: number;

  constructor(
    private readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    // 커서 위치까지 빠르게 진행 (상태만 진행, cursor 변경 없음)
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9e3779b97f4a7c15n) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  next(): number {
    // 상위 53비트만 사용 → [0, 1)
    return Number(this.nextRaw() >> 11n) / TWO_POW_53;
  }

  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** 현재 RNG 상태 (인카운터 저장용) */
  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }
}

@Injectable()
export class RngService {
  restore(state: RngState): Rng {
    return new Rng(state.seed, state.cursor);
  }
}
