export type RepairStatus =
  | 'Completed'
  | 'In Progress'
  | 'Received'
  | 'Reopened';

export const REPAIR_STATUSES: readonly RepairStatus[] = [
  'Completed',
  'In Progress',
  'Received',
  'Reopened',
];

/**
 * Every element of an event document the parser reads. Adding a field here
 * without declaring its path in the parser fails to compile.
 */
export type EventField =
  | 'order_id'
  | 'date_time'
  | 'status'
  | 'cost'
  | 'technician'
  | 'repair_parts'
  | 'part_name'
  | 'quantity';

export type ParseFailureReason =
  | 'malformed_document'
  | 'missing_field'
  | 'invalid_value'
  | 'invalid_timestamp'
  | 'empty_parts'
  | 'duplicate_part';

export interface PartLine {
  partName: string;
  quantity: number;
}

export interface ParsedEvent {
  orderId: number;
  timestamp: Date;
  status: RepairStatus;
  cost: number;
  technician: string;
  parts: PartLine[];
}

export interface RepairOrder {
  order_id: number;
  timestamp: Date;
  status: RepairStatus;
  cost: number;
  technician: string;
}

export interface RepairOrderDetail {
  order_id: number;
  part_name: string;
  quantity: number;
}

export interface MergedOrder {
  order: RepairOrder;
  details: RepairOrderDetail[];
}

export interface FinalState {
  orders: RepairOrder[];
  details: RepairOrderDetail[];
}

export type MergeOutcome = 'inserted' | 'replaced' | 'discarded';

export interface MergeStats {
  inserted: number;
  replaced: number;
  discarded: number;
}

export interface SourceDocument {
  name: string;
  path: string;
  content: string;
}

export interface LoadResult {
  orders: number;
  details: number;
}

export interface RunSummary {
  documents: number;
  parsed: number;
  skipped: number;
  replaced: number;
  discarded: number;
  ordersLoaded: number;
  detailsLoaded: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface PipelineConfig {
  database: DatabaseConfig;
  dataDir: string;
  logLevel: LogLevel;
  batchSize: number;
}
