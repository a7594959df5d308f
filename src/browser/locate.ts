/**
 * Locate-and-act fallback chain
 *
 * A logical action ("the login button") is described by candidate labels.
 * Each label expands into an ordered list of identification strategies:
 * accessible role + name, free text, then attribute patterns. Labels are
 * tried breadth-first and strategies depth-first; when the main document
 * has no match the same search runs inside every frame.
 */

import { attributePatternsFor } from '../xserver/selectors.js';
import { tryClick } from './actions.js';
import type { BrowserLocator, BrowserPage, InteractiveRole, SearchScope } from './types.js';

export type TargetStrategy =
  | { kind: 'role'; role: InteractiveRole; name: string }
  | { kind: 'text'; text: string }
  | { kind: 'attribute'; selector: string }
  | { kind: 'label'; label: string };

export const DEFAULT_ROLES: readonly InteractiveRole[] = ['button', 'link'];

export interface ClickTextOptions {
  timeout: number;
  roles?: readonly InteractiveRole[];
}

/**
 * Ordered strategies for one candidate label
 */
export function strategiesFor(
  label: string,
  roles: readonly InteractiveRole[] = DEFAULT_ROLES
): TargetStrategy[] {
  return [
    ...roles.map((role): TargetStrategy => ({ kind: 'role', role, name: label })),
    { kind: 'text', text: label },
    ...attributePatternsFor(label).map((selector): TargetStrategy => ({ kind: 'attribute', selector })),
  ];
}

export function resolveStrategy(scope: SearchScope, strategy: TargetStrategy): BrowserLocator {
  switch (strategy.kind) {
    case 'role':
      return scope.getByRole(strategy.role, { name: strategy.name, exact: false });
    case 'text':
      return scope.getByText(strategy.text, { exact: false });
    case 'attribute':
      return scope.locator(strategy.selector);
    case 'label':
      return scope.getByLabel(strategy.label, { exact: false });
  }
}

/**
 * Clicks through the first strategy that accepts a click.
 * Returns the winning strategy, or null when all of them missed.
 */
export async function clickFirst(
  scope: SearchScope,
  strategies: readonly TargetStrategy[],
  timeout: number
): Promise<TargetStrategy | null> {
  for (const strategy of strategies) {
    let target: BrowserLocator;
    try {
      target = resolveStrategy(scope, strategy);
    } catch {
      // Malformed selector for this engine
      continue;
    }
    if (await tryClick(scope, target, timeout)) {
      return strategy;
    }
  }
  return null;
}

/**
 * Searches one document. Returns the label that matched, or null.
 */
export async function clickByText(
  scope: SearchScope,
  texts: readonly string[],
  options: ClickTextOptions
): Promise<string | null> {
  for (const text of texts) {
    if (await clickFirst(scope, strategiesFor(text, options.roles), options.timeout)) {
      return text;
    }
  }
  return null;
}

/**
 * Searches the main document, then each frame in document order
 */
export async function clickTextGlobal(
  page: BrowserPage,
  texts: readonly string[],
  options: ClickTextOptions
): Promise<string | null> {
  const matched = await clickByText(page, texts, options);
  if (matched) {
    return matched;
  }

  let frames: SearchScope[];
  try {
    const main = page.mainFrame();
    frames = page.frames().filter((frame) => frame !== main);
  } catch {
    return null;
  }

  for (const frame of frames) {
    const inFrame = await clickByText(frame, texts, options);
    if (inFrame) {
      return inFrame;
    }
  }
  return null;
}
