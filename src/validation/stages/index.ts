import type { ValidationStage } from '../types';
import { checkSatelliteAssignment, checkTargetCoverage } from './coverage';
import { checkMasterNodes } from './masters';
import { adviseMerges } from './merge';
import { scoreQuality } from './quality';
import { checkStrategyConstraints } from './strategy';

export { checkStructure } from './structure';
export type { StructureCheck } from './structure';

/** Stages run after the structural check, in reporting order. */
export const VALIDATION_STAGES: readonly ValidationStage[] = [
  checkTargetCoverage,
  checkSatelliteAssignment,
  checkMasterNodes,
  checkStrategyConstraints,
  scoreQuality,
  adviseMerges,
];
