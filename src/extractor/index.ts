export { extractAll, extractWorkouts } from './workoutExtractor';
export type { ExtractOptions } from './workoutExtractor';
export { WorkoutBuilder } from './workoutBuilder';
export type { Attributes, ValueScope } from './workoutBuilder';
export {
  coerceNumber,
  distanceToKm,
  durationToSeconds,
  energyToKcal,
  lengthToMeters,
  parseExportTimestamp,
  parseMetadataValue,
  parseQuantity,
} from './valueParser';
export type { ParsedMetadataValue, ParsedQuantity, ParsedTimestamp } from './valueParser';
