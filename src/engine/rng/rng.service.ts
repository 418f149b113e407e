// splitmix64 기반 결정적 RNG — 배틀 내 유일한 난수원

import { Injectable } from '@nestjs/common';

export interface RngState {
  seed: string;
  cursor: number;
}

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;
const GOLDEN_GAMMA = 0x9E3779B97F4A7C15n;
const TWO_POW_53 = 2 ** 53;

export class Rng {
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(
    readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = Rng.hashSeed(seed);
    this._cursor = cursor;
    this._consumed = 0;
    // 커서 위치까지 상태만 진행
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private static hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수 — 상위 53비트 사용 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / TWO_POW_53;
  }

  /** probability(0~1) 확률로 true. 0 이하/1 이상은 난수를 소비하지 않는다 */
  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.next() < probability;
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  restore(state: RngState): Rng {
    return new Rng(state.seed, state.cursor);
  }
}
