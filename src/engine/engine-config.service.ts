// Engine settings: .env defaults read once at construction

import { Injectable, Logger } from '@nestjs/common';

export interface EngineConfig {
  engagementRangeInches: number;
  terrainEngagementRangeInches: number;
  pileInInches: number;
  consolidateInches: number;
  coherencyInches: number;
  scoutEnemyBufferInches: number;
  deadlyDemiseRangeInches: number;
  maxBattleRounds: number;
  startingCp: number;
  debugModeAllowed: boolean;
  contentDir: string;
  port: number;
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    engagementRangeInches: num(env.ENGAGEMENT_RANGE_INCHES, 1),
    terrainEngagementRangeInches: num(env.TERRAIN_ENGAGEMENT_RANGE_INCHES, 2),
    pileInInches: num(env.PILE_IN_INCHES, 3),
    consolidateInches: num(env.CONSOLIDATE_INCHES, 3),
    coherencyInches: num(env.COHERENCY_INCHES, 2),
    scoutEnemyBufferInches: num(env.SCOUT_ENEMY_BUFFER_INCHES, 9),
    deadlyDemiseRangeInches: num(env.DEADLY_DEMISE_RANGE_INCHES, 6),
    maxBattleRounds: parseInt(env.MAX_BATTLE_ROUNDS ?? '5', 10),
    startingCp: parseInt(env.STARTING_CP ?? '3', 10),
    debugModeAllowed:
      env.DEBUG_MODE_ALLOWED !== undefined
        ? env.DEBUG_MODE_ALLOWED === 'true'
        : env.NODE_ENV !== 'production',
    contentDir: env.CONTENT_DIR ?? 'content',
    port: parseInt(env.PORT ?? '3000', 10),
  };
}

@Injectable()
export class EngineConfigService {
  private readonly logger = new Logger(EngineConfigService.name);
  private config: EngineConfig;

  constructor() {
    this.config = loadEngineConfig();
  }

  get(): EngineConfig {
    return this.config;
  }

  /** Runtime override; takes effect on the next action processed. */
  update(patch: Partial<EngineConfig>): EngineConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Engine config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
