export { RecordStore } from './RecordStore';
export type { DateBounds } from './RecordStore';
