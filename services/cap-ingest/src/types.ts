export type RosterStatus =
  | 'active'
  | 'reserve/suspended'
  | 'exempt'
  | 'ir'
  | 'pup'
  | 'non-football injury'
  | 'practice squad'
  | 'dead cap';

export type CategoryLocator = 'class' | 'heading';

export interface RosterCategory {
  label: string;
  status: RosterStatus;
  locator: CategoryLocator;
}

/** Column names match the `cap_tracker` table. */
export interface PlayerCapRecord {
  readonly player_name: string | null;
  readonly position: string | null;
  readonly cap_hit: number | null;
  readonly roster_status: RosterStatus;
  readonly team: string;
}

export interface RecordContext {
  roster_status: RosterStatus;
  team: string;
}

export type CapField = 'player_name' | 'position' | 'cap_hit';

export interface FieldExtractionIssue {
  field: CapField;
  team: string;
  roster_status: RosterStatus;
  player_name: string | null;
  reason: string;
}

export interface TeamCapDataset {
  team: string;
  records: readonly PlayerCapRecord[];
  total_cap_hit: number;
  issues: readonly FieldExtractionIssue[];
}
