// Exit conditions surfaced by one renewal run
export const ExitConditions = {
  SUCCESS: 'SUCCESS',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
  SKIPPED_TOO_SOON: 'SKIPPED_TOO_SOON',
  AUTH_CONFIG_MISSING: 'AUTH_CONFIG_MISSING',
  AUTH_FAILED: 'AUTH_FAILED',
  MANAGEMENT_NOT_FOUND: 'MANAGEMENT_NOT_FOUND',
  UPGRADE_NOT_FOUND: 'UPGRADE_NOT_FOUND',
  SUBMIT_NOT_FOUND: 'SUBMIT_NOT_FOUND',
  SUCCESS_NOT_CONFIRMED: 'SUCCESS_NOT_CONFIRMED',
} as const;

export type ExitCondition = (typeof ExitConditions)[keyof typeof ExitConditions];

// Process exit code per condition
export const ExitCodes: Record<ExitCondition, number> = {
  SUCCESS: 0,
  INTERNAL_ERROR: 1,
  CONFIG_INVALID: 2,
  SKIPPED_TOO_SOON: 10,
  AUTH_CONFIG_MISSING: 20,
  AUTH_FAILED: 21,
  MANAGEMENT_NOT_FOUND: 30,
  UPGRADE_NOT_FOUND: 31,
  SUBMIT_NOT_FOUND: 32,
  SUCCESS_NOT_CONFIRMED: 33,
};

// Error structure carried by failed steps
export interface RunError {
  code: ExitCondition;
  message: string;
}

export type StepResult = { success: true } | { success: false; error: RunError };

// Final result of one invocation
export interface RunOutcome {
  condition: ExitCondition;
  exitCode: number;
  message: string;
  // Outcome Record line written by this run, if any
  recordedLine?: string;
}

export interface Credentials {
  email: string;
  password: string;
}

/**
 * Candidate label sets for every step of the login and renewal flow.
 * Order is priority: earlier labels are tried first.
 */
export interface PanelLabels {
  loginMarkers: readonly string[];
  loginButton: readonly string[];
  emailLabels: readonly string[];
  passwordLabels: readonly string[];
  managementAction: string;
  upgrade: readonly string[];
  detail: readonly string[];
  contract: readonly string[];
  extendEntry: readonly string[];
  agreementKeywords: readonly string[];
  confirm: readonly string[];
  submit: readonly string[];
  success: readonly string[];
}

export interface Config {
  credentials: Credentials | null;
  cookie: string | null;
  cookieDomains: readonly string[];
  targetGame: string | null;
  renewHours: number;
  minIntervalHours: number;
  forceRenew: boolean;
  outcomeLogPath: string;
  logTimezone: string;
  headless: boolean;
  defaultTimeoutMs: number;
  shortTimeoutMs: number;
  screenshotDir: string;
  pageDumpDir: string;
  strictSuccessDetection: boolean;
  loginUrl: string;
  indexUrl: string;
  labels: PanelLabels;
}
