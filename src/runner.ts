import { v4 as uuidv4 } from 'uuid';
import { establishSession } from './auth/session.js';
import { launchBrowserSession } from './browser/launch.js';
import type { BrowserPage, BrowserSession } from './browser/types.js';
import { FileDiagnostics, type DiagnosticCapture } from './diagnostics.js';
import { createChildLogger } from './logger.js';
import { appendSuccess, evaluateRunGate, readLastSuccess } from './outcome-log.js';
import { ExitCodes, ExitConditions, type Config, type ExitCondition, type RunOutcome } from './types.js';
import { runRenewalWizard } from './xserver/wizard.js';

/**
 * Collaborators a run can be given in place of the real browser and clock
 */
export interface RunDependencies {
  launchSession?: (config: Config) => Promise<BrowserSession>;
  createDiagnostics?: (page: BrowserPage, config: Config) => DiagnosticCapture;
  now?: () => Date;
  runId?: string;
}

function outcome(condition: ExitCondition, message: string, recordedLine?: string): RunOutcome {
  return { condition, exitCode: ExitCodes[condition], message, recordedLine };
}

function fileDiagnostics(page: BrowserPage, config: Config): DiagnosticCapture {
  return new FileDiagnostics(page, {
    screenshotDir: config.screenshotDir,
    pageDumpDir: config.pageDumpDir,
  });
}

/**
 * One renewal run: gate → login → wizard → record.
 * The browser is closed on every path.
 */
export async function runRenewal(config: Config, deps: RunDependencies = {}): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date());
  const launchSession = deps.launchSession ?? launchBrowserSession;
  const createDiagnostics = deps.createDiagnostics ?? fileDiagnostics;
  const log = createChildLogger({ run_id: deps.runId ?? uuidv4() });

  log.info(
    {
      targetGame: config.targetGame,
      renewHours: config.renewHours,
      minIntervalHours: config.minIntervalHours,
      forceRenew: config.forceRenew,
    },
    'Starting renewal run'
  );

  const lastSuccessAt = await readLastSuccess(config.outcomeLogPath);
  const gate = evaluateRunGate({
    lastSuccessAt,
    now: now(),
    minIntervalHours: config.minIntervalHours,
    force: config.forceRenew,
  });
  if (!gate.due) {
    log.info(
      { lastSuccessAt: lastSuccessAt?.toISOString(), elapsedHours: gate.elapsedHours },
      'Last renewal is too recent, skipping'
    );
    return outcome(ExitConditions.SKIPPED_TOO_SOON, 'Last successful renewal is within the minimum interval');
  }
  if (config.forceRenew && lastSuccessAt) {
    log.info({ elapsedHours: gate.elapsedHours }, 'Forced renewal, ignoring minimum interval');
  }

  if (!config.cookie && !config.credentials) {
    log.error('Neither a cookie nor credentials are configured');
    return outcome(ExitConditions.AUTH_CONFIG_MISSING, 'Set XSERVER_COOKIE or XSERVER_EMAIL and XSERVER_PASSWORD');
  }

  const session = await launchSession(config);
  const diagnostics = createDiagnostics(session.page, config);

  try {
    const auth = await establishSession(session, config, diagnostics, log);
    if (!auth.authenticated) {
      log.error('Login failed');
      return outcome(ExitConditions.AUTH_FAILED, 'Could not verify a logged-in session');
    }

    const wizard = await runRenewalWizard({ page: session.page, config, diagnostics, log });
    if (!wizard.success) {
      log.error({ code: wizard.error.code }, wizard.error.message);
      return outcome(wizard.error.code, wizard.error.message);
    }

    const line = await appendSuccess(config.outcomeLogPath, config.logTimezone, now());
    log.info({ line, path: config.outcomeLogPath }, 'Renewal recorded');
    return outcome(ExitConditions.SUCCESS, 'Renewal submitted', line);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ error: message }, 'Unexpected error during renewal');
    await diagnostics.screenshot('unexpected_error');
    await diagnostics.dumpHtml('unexpected_error');
    return outcome(ExitConditions.INTERNAL_ERROR, `Unexpected error: ${message}`);
  } finally {
    await session.close();
  }
}
