export interface WorkPeriod {
  start: string; // ISO string
  end: string | null; // null while the period is running
}

export interface StoreFile {
  version: number;
  periods: WorkPeriod[];
}

export interface BeginResult {
  period: WorkPeriod;
  previous?: WorkPeriod;
}

export interface EndResult {
  period: WorkPeriod;
}
