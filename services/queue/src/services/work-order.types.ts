/**
 * Work order fields the cleaning queue reads and writes.
 *
 * The wider work order entity has many more columns; the queue only needs
 * these. Date fields arrive raw (legacy rows store text in several formats)
 * and are parsed once, by `parseQueueDate`.
 */

export type RawDate = string | Date | null;

export interface WorkOrderRecord {
  workOrderNo: string;
  custId: string | null;
  woName: string | null;
  shipTo: string | null;
  firmRush: boolean;
  rush: boolean;
  dateIn: RawDate;
  dateRequired: RawDate;
  dateCompleted: RawDate;
  /** null = not yet ranked */
  position: number | null;
}

export type QueueTier = 'firm_rush' | 'rush' | 'regular';

export interface PositionUpdate {
  workOrderNo: string;
  position: number;
}

/** Outcome shared by every engine operation; nothing is thrown past the engine. */
export type QueueErrorType = 'validation' | 'storage';

export interface QueueOperationResult {
  success: boolean;
  message: string;
  errorType?: QueueErrorType;
}
