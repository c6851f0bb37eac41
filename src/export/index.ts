export { escapeCsvCell, periodSeriesToCsv, workoutsToCsv } from './csv';
export { periodSeriesToJson, toExportDocument, workoutsToJson } from './json';
export type { ExportDocument } from './json';
