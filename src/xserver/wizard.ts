/**
 * Renewal wizard
 *
 * Drives the panel from the server list to a submitted extension:
 * management entry → upgrade/extend page → duration → agreements →
 * confirmation → final submit → success check.
 *
 * Only the management entry, the upgrade page and the final submit are
 * required. Everything else is best-effort, because the panel sometimes
 * skips pages or preselects the duration.
 */

import type { Logger } from 'pino';
import {
  gotoAndSettle,
  hasVisibleText,
  isShown,
  scrollToBottom,
  tryCheck,
  tryClick,
  waitForQuiet,
} from '../browser/actions.js';
import { clickFirst, clickTextGlobal, type TargetStrategy } from '../browser/locate.js';
import type { BrowserLocator, BrowserPage, SearchScope } from '../browser/types.js';
import type { DiagnosticCapture } from '../diagnostics.js';
import { ExitConditions, type Config, type ExitCondition, type StepResult } from '../types.js';
import {
  ANY_ROW_SELECTOR,
  CHECKBOX_SELECTOR,
  MAX_AGREEMENT_CHECKBOXES,
  MAX_ROWS_SCANNED,
  SUBMIT_FALLBACK_SELECTORS,
  TABLE_ROW_SELECTOR,
  TIMEOUTS,
  attributePatternsFor,
  cssString,
  durationLabels,
  durationValueSelectors,
  pageActionSelectors,
  rowActionSelectors,
} from './selectors.js';

/**
 * Step names for logs and diagnostics
 */
export const Steps = {
  OPEN_MANAGEMENT: 'open_management',
  OPEN_UPGRADE: 'open_upgrade',
  SELECT_DURATION: 'select_duration',
  ACCEPT_AGREEMENTS: 'accept_agreements',
  GO_CONFIRM: 'go_confirm',
  SUBMIT: 'submit',
  VERIFY_SUCCESS: 'verify_success',
} as const;

export interface WizardStep {
  name: string;
  candidateTexts: readonly string[];
  required: boolean;
  // Exit condition when a required step fails
  failure?: ExitCondition;
  // Unlabelled controls tried after every candidate text missed
  fallbackSelectors?: readonly string[];
}

export interface WizardContext {
  page: BrowserPage;
  config: Config;
  diagnostics: DiagnosticCapture;
  log: Logger;
}

function fail(code: ExitCondition, message: string): StepResult {
  return { success: false, error: { code, message } };
}

/**
 * The first visible element among selectors under a root, clicked
 */
async function clickFirstVisible(
  ctx: WizardContext,
  root: BrowserPage | BrowserLocator,
  selectors: readonly string[]
): Promise<boolean> {
  for (const selector of selectors) {
    try {
      const target = root.locator(selector);
      if ((await target.count()) > 0 && (await isShown(target))) {
        return await tryClick(ctx.page, target, TIMEOUTS.ROW_ACTION);
      }
    } catch {
      // Try the next selector
    }
  }
  return false;
}

/**
 * Runs one label-driven step through the global fallback chain.
 * Soft steps that miss are logged and reported as successful.
 */
export async function runStep(ctx: WizardContext, step: WizardStep): Promise<StepResult> {
  const matched = await clickTextGlobal(ctx.page, step.candidateTexts, {
    timeout: ctx.config.shortTimeoutMs,
  });
  if (matched) {
    ctx.log.info({ step: step.name, label: matched }, 'Step control clicked');
    await waitForQuiet(ctx.page, ctx.config.defaultTimeoutMs);
    await ctx.diagnostics.screenshot(`after_${step.name}`);
    return { success: true };
  }

  if (step.fallbackSelectors && (await clickFirstVisible(ctx, ctx.page, step.fallbackSelectors))) {
    ctx.log.info({ step: step.name }, 'Step control clicked via generic selector');
    await waitForQuiet(ctx.page, ctx.config.defaultTimeoutMs);
    await ctx.diagnostics.screenshot(`after_${step.name}_fallback`);
    return { success: true };
  }

  if (!step.required) {
    ctx.log.warn({ step: step.name }, 'Optional step control not found, continuing');
    return { success: true };
  }

  ctx.log.error({ step: step.name, candidates: step.candidateTexts }, 'Required step control not found');
  await ctx.diagnostics.screenshot(`${step.name}_not_found`);
  await ctx.diagnostics.dumpHtml(`${step.name}_not_found`);
  return fail(step.failure ?? ExitConditions.INTERNAL_ERROR, `No control found for step ${step.name}`);
}

async function findTargetRow(ctx: WizardContext, target: string): Promise<BrowserLocator | null> {
  for (const selector of [TABLE_ROW_SELECTOR, ANY_ROW_SELECTOR]) {
    try {
      const rows = ctx.page.locator(selector).filter({ hasText: target });
      if ((await rows.count()) > 0) {
        return rows.first();
      }
    } catch {
      // Fall through to the next row selector
    }
  }
  return null;
}

/**
 * Clicks the row-level "ゲーム管理" control for the configured server,
 * or for the first server listed when none is configured or matched
 */
export async function openManagement(ctx: WizardContext): Promise<StepResult> {
  const { page, config, diagnostics } = ctx;
  const log = ctx.log.child({ step: Steps.OPEN_MANAGEMENT });
  const action = config.labels.managementAction;
  const rowSelectors = rowActionSelectors(action);

  await gotoAndSettle(page, config.indexUrl, config.defaultTimeoutMs);
  await diagnostics.screenshot('on_game_index');

  if (config.targetGame) {
    const row = await findTargetRow(ctx, config.targetGame);
    if (row && (await clickFirstVisible(ctx, row, rowSelectors))) {
      log.info({ targetGame: config.targetGame }, 'Opened management for target row');
      await waitForQuiet(page, config.defaultTimeoutMs);
      await diagnostics.screenshot('clicked_row_game_management_target');
      return { success: true };
    }
    log.warn({ targetGame: config.targetGame }, 'Target row not found, using first server');
  }

  if (await clickFirstVisible(ctx, page, pageActionSelectors(action))) {
    log.info('Opened management for first listed server');
    await waitForQuiet(page, config.defaultTimeoutMs);
    await diagnostics.screenshot('clicked_row_game_management_first');
    return { success: true };
  }

  try {
    const rows = page.locator(TABLE_ROW_SELECTOR);
    const count = Math.min(await rows.count(), MAX_ROWS_SCANNED);
    for (let i = 0; i < count; i++) {
      if (await clickFirstVisible(ctx, rows.nth(i), rowSelectors)) {
        log.info({ row: i }, 'Opened management by row scan');
        await waitForQuiet(page, config.defaultTimeoutMs);
        await diagnostics.screenshot(`clicked_row_game_management_index_${i}`);
        return { success: true };
      }
    }
  } catch (err) {
    log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Row scan failed');
  }

  log.error({ action }, 'Row-level management control not found');
  await diagnostics.screenshot('game_management_not_found');
  await diagnostics.dumpHtml('game_management_not_found');
  return fail(ExitConditions.MANAGEMENT_NOT_FOUND, `No "${action}" control found on the server list`);
}

/**
 * Detail/settings page of the target server, used when the management
 * page has no upgrade entry
 */
async function openDetail(ctx: WizardContext): Promise<boolean> {
  const { page, config } = ctx;
  const { detail } = config.labels;

  if (config.targetGame) {
    const row = await findTargetRow(ctx, config.targetGame);
    if (row) {
      for (const text of detail) {
        for (const selector of attributePatternsFor(text)) {
          if (await tryClick(page, row.locator(selector), config.shortTimeoutMs)) {
            return true;
          }
        }
      }
    }
  }

  return (await clickTextGlobal(page, detail, { timeout: config.shortTimeoutMs })) !== null;
}

export async function openUpgrade(ctx: WizardContext): Promise<StepResult> {
  const { page, config, diagnostics } = ctx;
  const log = ctx.log.child({ step: Steps.OPEN_UPGRADE });
  const options = { timeout: config.shortTimeoutMs };
  const { upgrade, contract } = config.labels;

  if (await clickTextGlobal(page, upgrade, options)) {
    await diagnostics.screenshot('after_click_upgrade_extend');
    return { success: true };
  }

  log.info('Upgrade/extend not found on management page, trying detail and billing pages');
  if (await openDetail(ctx)) {
    await waitForQuiet(page, config.defaultTimeoutMs);
    await diagnostics.screenshot('after_open_detail');
    if (await clickTextGlobal(page, upgrade, options)) {
      await diagnostics.screenshot('after_click_upgrade_extend_from_detail');
      return { success: true };
    }

    if (await clickTextGlobal(page, contract, options)) {
      await waitForQuiet(page, config.defaultTimeoutMs);
      await diagnostics.screenshot('after_open_contract_or_billing');
      if (await clickTextGlobal(page, upgrade, options)) {
        await diagnostics.screenshot('after_click_upgrade_extend_from_contract');
        return { success: true };
      }
    }
  }

  log.error('Upgrade/extend entry not found');
  await diagnostics.screenshot('open_upgrade_extend_failed');
  await diagnostics.dumpHtml('open_upgrade_extend_failed');
  return fail(ExitConditions.UPGRADE_NOT_FOUND, 'No upgrade or extend entry found');
}

/**
 * Strategies for the duration radio, in priority order
 */
export function durationStrategies(hours: number): TargetStrategy[] {
  const labels = durationLabels(hours);
  return [
    ...labels.map((label): TargetStrategy => ({ kind: 'label', label })),
    ...labels.map((name): TargetStrategy => ({ kind: 'role', role: 'radio', name })),
    ...labels.map((text): TargetStrategy => ({ kind: 'attribute', selector: `label:has-text(${cssString(text)})` })),
    ...durationValueSelectors(hours).map((selector): TargetStrategy => ({ kind: 'attribute', selector })),
  ];
}

/**
 * Selects the configured duration. Returns false when no control matched,
 * which is tolerated: the panel may preselect it.
 */
export async function selectDuration(ctx: WizardContext): Promise<boolean> {
  const { page, config, diagnostics } = ctx;
  const log = ctx.log.child({ step: Steps.SELECT_DURATION, hours: config.renewHours });
  const options = { timeout: config.shortTimeoutMs };

  await scrollToBottom(page);
  if (await clickTextGlobal(page, config.labels.extendEntry, options)) {
    await waitForQuiet(page, config.defaultTimeoutMs);
    await diagnostics.screenshot('after_click_entry_extend');
  } else {
    log.warn('Extend entry button not found at page bottom, continuing');
  }

  const selected =
    (await clickFirst(page, durationStrategies(config.renewHours), config.shortTimeoutMs)) !== null ||
    (await clickTextGlobal(page, durationLabels(config.renewHours), options)) !== null;

  if (selected) {
    log.info('Duration selected');
    await diagnostics.screenshot(`selected_${config.renewHours}h`);
  } else {
    log.warn('Could not select duration, it may be unavailable or preselected');
    await diagnostics.screenshot(`failed_select_${config.renewHours}h`);
  }
  return selected;
}

/**
 * Ticks agreement labels and up to five unchecked checkboxes.
 * Returns the number of checkboxes checked.
 */
export async function acceptAgreements(ctx: WizardContext): Promise<number> {
  const { page, config } = ctx;

  for (const keyword of config.labels.agreementKeywords) {
    await tryClick(page, page.locator(`label:has-text(${cssString(keyword)})`), TIMEOUTS.AGREEMENT);
  }

  let checked = 0;
  try {
    const boxes = page.locator(CHECKBOX_SELECTOR);
    const count = Math.min(await boxes.count(), MAX_AGREEMENT_CHECKBOXES);
    for (let i = 0; i < count; i++) {
      const box = boxes.nth(i);
      try {
        if ((await box.isVisible()) && !(await box.isChecked())) {
          if (await tryCheck(box, TIMEOUTS.AGREEMENT)) {
            checked++;
          }
        }
      } catch {
        // Detached while iterating
      }
    }
  } catch {
    // No checkbox list on this page
  }

  if (checked > 0) {
    ctx.log.info({ step: Steps.ACCEPT_AGREEMENTS, checked }, 'Checked agreement checkboxes');
  }
  return checked;
}

/**
 * Final commit. The one wizard page that must be found.
 */
export async function submitRenewal(ctx: WizardContext): Promise<StepResult> {
  await scrollToBottom(ctx.page);
  await acceptAgreements(ctx);

  return runStep(ctx, {
    name: Steps.SUBMIT,
    candidateTexts: ctx.config.labels.submit,
    required: true,
    failure: ExitConditions.SUBMIT_NOT_FOUND,
    fallbackSelectors: SUBMIT_FALLBACK_SELECTORS,
  });
}

/**
 * Looks for a success message in the page and its frames
 */
export async function verifySuccess(ctx: WizardContext): Promise<StepResult> {
  const { page, config, diagnostics } = ctx;
  const log = ctx.log.child({ step: Steps.VERIFY_SUCCESS });

  await waitForQuiet(page, config.defaultTimeoutMs);
  await diagnostics.screenshot('verify_success');

  const main = page.mainFrame();
  const scopes: SearchScope[] = [page, ...page.frames().filter((frame) => frame !== main)];
  for (const scope of scopes) {
    const found = await hasVisibleText(scope, config.labels.success);
    if (found) {
      log.info({ marker: found }, 'Renewal confirmed');
      return { success: true };
    }
  }

  await diagnostics.dumpHtml('success_not_confirmed');
  if (config.strictSuccessDetection) {
    log.error('No success message found after submit');
    return fail(ExitConditions.SUCCESS_NOT_CONFIRMED, 'No success message found after submit');
  }
  log.warn('No success message found after submit, treating as success');
  return { success: true };
}

/**
 * Drives the whole wizard on an authenticated page
 */
export async function runRenewalWizard(ctx: WizardContext): Promise<StepResult> {
  const management = await openManagement(ctx);
  if (!management.success) return management;

  const upgrade = await openUpgrade(ctx);
  if (!upgrade.success) return upgrade;

  await selectDuration(ctx);
  await acceptAgreements(ctx);

  await runStep(ctx, {
    name: Steps.GO_CONFIRM,
    candidateTexts: ctx.config.labels.confirm,
    required: false,
  });

  const submitted = await submitRenewal(ctx);
  if (!submitted.success) return submitted;

  return verifySuccess(ctx);
}
