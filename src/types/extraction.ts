/**
 * Extraction diagnostics and load status types.
 */

export type DiagnosticKind = 'coercion' | 'record-skipped' | 'unit';

/**
 * Non-fatal issue found while assembling a workout.
 * The affected field (or record) is dropped; extraction continues.
 */
export interface ExtractionDiagnostic {
  field: string;
  kind: DiagnosticKind;
  /** Line of the document where the offending element was read. */
  line: number;
  message: string;
  rawValue: string | undefined;
  /** Zero-based ordinal of the workout element in the document. */
  workoutIndex: number;
}

export type DiagnosticSink = (diagnostic: ExtractionDiagnostic) => void;

export interface ExtractionStats {
  diagnostics: number;
  emitted: number;
  skipped: number;
  workoutsSeen: number;
}

export type LoadStatus = 'complete' | 'empty' | 'partial';

export interface StoreInfo {
  loadedAt?: Date;
  /** Message of the failure that cut a partial load short. */
  error?: string;
  source?: string;
  status: LoadStatus;
}
