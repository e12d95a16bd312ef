export type Fix = {
  search: string;
  replace: string;
};

export type Occurrence = {
  index: number;
  sentence: string;
  containerIndex: number;
};

export type SessionMode = "edit" | "analyze" | "fix";

export type SessionState = {
  userId: string;
  mode: SessionMode;
  createdAt: number;
  lastActivity: number;
  warningSent: boolean;
  channel?: string;
  filePath?: string;
  originalName?: string;
  findText?: string;
  replaceText?: string;
  occurrences: Occurrence[];
  pendingFixes: Fix[];
  appliedFixes: Fix[];
  skippedFixes: Fix[];
};

export type SessionUpdate = Partial<
  Pick<
    SessionState,
    | "mode"
    | "findText"
    | "replaceText"
    | "occurrences"
    | "pendingFixes"
    | "appliedFixes"
    | "skippedFixes"
  >
>;

export type SweepTarget = {
  userId: string;
  channel: string | null;
};

export type FixOutcomeStatus = "applied" | "not_found" | "malformed" | "failed";

export type FixOutcome = {
  fix: Fix;
  status: FixOutcomeStatus;
  replacements: number;
};

export type ApplyStatus = "changed" | "unchanged" | "failed";

export type ApplyResult = {
  status: ApplyStatus;
  artifactPath: string | null;
  appliedCount: number;
  skippedCount: number;
  applied: Fix[];
  skipped: Fix[];
  outcomes: FixOutcome[];
  error?: string;
};

export type ReplaceResult = {
  status: ApplyStatus;
  artifactPath: string | null;
  replacements: number;
  error?: string;
};

export type UsageStatus = "ok" | "limit_warning" | "limit_reached";

export type UsageCheck = {
  allowed: boolean;
  remaining: number;
  status: UsageStatus;
};

export type ValidationResult = {
  valid: boolean;
  reason: string;
};
