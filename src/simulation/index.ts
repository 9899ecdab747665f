export {
  SimulationController,
  isBreakpointCondition,
  isObjectFilter,
  isRadix,
  isSimulationMode,
  type SimulationControllerOptions,
} from './controller.js';
export {
  ZERO_TIME,
  formatTime,
  normalizeDuration,
  parseSimulationTime,
  toFemtoseconds,
  type SimulationTime,
  type TimeUnit,
} from './time.js';
export type * from './types.js';
