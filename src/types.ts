// Config paths
export interface PathsConfig {
  input: string;
  output: string;
}

// Post-run summary settings
export interface ReportConfig {
  enabled: boolean;
}

// Full configuration structure
export interface Config {
  paths: PathsConfig;
  report: ReportConfig;
}

// A team as written to the output document
export interface TeamRecord {
  peoples: string[];
  price: number;
}

// A task as written to the output document
export interface TaskRecord {
  name: string;
  teams: TeamRecord[];
}

export interface OutputDocument {
  Tasks: TaskRecord[];
}

// Explicit file locations for a single run
export interface RunOptions {
  input: string;
  output: string;
}
