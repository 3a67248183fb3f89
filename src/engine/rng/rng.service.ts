import { Injectable } from '@nestjs/common';
import type { DiceSource } from '../../types/index.js';

const MASK = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

export interface DiceFactory {
  create(seed: string, cursor?: number): DiceSource;
}

/** FNV-1a over the seed's UTF-16 code units. */
export function seedHash(seed: string): bigint {
  let h = FNV_OFFSET;
  for (let i = 0; i < seed.length; i++) {
    h = ((h ^ BigInt(seed.charCodeAt(i))) * FNV_PRIME) & MASK;
  }
  return h;
}

/** The splitmix64 output for roll number `index` (0-based) of a stream. */
export function splitmix64(base: bigint, index: number): bigint {
  let z = (base + BigInt(index + 1) * GOLDEN_GAMMA) & MASK;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK;
  return z ^ (z >> 31n);
}

/**
 * Seekable dice stream. Roll `n` depends only on the seed and `n`, so a
 * stream rebuilt from `meta.rng` continues exactly where the last one stopped.
 */
export class SeededDice implements DiceSource {
  private readonly base: bigint;
  private position: number;

  constructor(
    readonly seed: string,
    readonly start = 0,
  ) {
    this.base = seedHash(seed);
    this.position = start;
  }

  get cursor(): number {
    return this.position;
  }

  /** Rolls taken from this instance. */
  get consumed(): number {
    return this.position - this.start;
  }

  d6(): number {
    return this.die(6);
  }

  d3(): number {
    return this.die(3);
  }

  die(sides: number): number {
    // top 53 bits as a float in [0, 1)
    const unit = Number(splitmix64(this.base, this.position++) >> 11n) / 2 ** 53;
    return Math.floor(unit * sides) + 1;
  }
}

@Injectable()
export class RngService implements DiceFactory {
  create(seed: string, cursor = 0): SeededDice {
    return new SeededDice(seed, cursor);
  }
}
