export type Category = 'dts' | 'config' | 'drivers' | 'script' | 'patch' | 'other';

export type ClassificationPolicy = 'full' | 'minimal';

export type UntrackedMode = 'stage' | 'ignore';

export interface AppConfig {
  apiKey: string;
  endpoint: string;
  requestTimeoutMs: number;
  policy: ClassificationPolicy;
  untracked: UntrackedMode;
  strictInput: boolean;
  remote?: string;
}

/**
 * Structured result parsed out of the completion response. `cpu`, `machine`
 * and `type` may hold the sentinel "unknown" or be empty.
 */
export interface AnalysisResult {
  cpu: string;
  machine: string;
  type: string;
  title: string;
  details: string[];
}

export type CommitFields = AnalysisResult;

export interface Vocabulary {
  cpus: readonly string[];
  machines: readonly string[];
  types: readonly string[];
}

export interface ChangeSet {
  changed: string[];
  untracked: string[];
}

export interface Prompter {
  input(message: string): Promise<string>;
}

export type CategoryOutcome = 'committed' | 'no-diff' | 'no-analysis' | 'declined' | 'failed';

export interface CommitContext {
  repoPath: string;
  config: AppConfig;
  prompter: Prompter;
}

export interface CommitRunSummary {
  outcomes: Partial<Record<Category, CategoryOutcome>>;
  uncategorized: string[];
  pushed: boolean;
}
