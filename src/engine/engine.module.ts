import { Module } from '@nestjs/common';
import type { Provider } from '@nestjs/common';
import { KillHandlerService } from './combat/kill-handler.service.js';
import { ResolutionPipeline } from './combat/resolution-pipeline.js';
import { EngagementService } from './geometry/engagement.service.js';
import { MeasurementService } from './geometry/measurement.service.js';
import { MovementValidatorService } from './geometry/movement-validator.service.js';
import { PhaseFactoryService } from './phases/phase-factory.service.js';
import { ReplayService } from './replay/replay.service.js';
import { RngService } from './rng/rng.service.js';
import { DICE_FACTORY, MEASUREMENT, RULES_ENGINE } from './rules/rules.tokens.js';
import { StandardRulesEngine } from './rules/standard-rules-engine.service.js';
import { StateDiffService } from './state/state-diff.service.js';

const providers: Provider[] = [
  // State
  StateDiffService,
  RngService,
  // Geometry
  MeasurementService,
  EngagementService,
  MovementValidatorService,
  // Rules + combat
  StandardRulesEngine,
  KillHandlerService,
  ResolutionPipeline,
  // Orchestration
  PhaseFactoryService,
  ReplayService,
  // Collaborator bindings
  { provide: MEASUREMENT, useExisting: MeasurementService },
  { provide: RULES_ENGINE, useExisting: StandardRulesEngine },
  { provide: DICE_FACTORY, useExisting: RngService },
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
