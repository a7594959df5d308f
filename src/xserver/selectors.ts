/**
 * XServer for Game panel: URLs, label sets and selector patterns
 *
 * Every string the bot searches the panel for lives here. When the panel's
 * wording or markup changes, update it in one place.
 */

import type { PanelLabels } from '../types.js';

// ============================================================================
// URLS
// ============================================================================

export const URLS = {
  LOGIN: 'https://secure.xserver.ne.jp/xapanel/login/xserver/?request_page=xmgame%2Findex',
  GAME_INDEX: 'https://secure.xserver.ne.jp/xapanel/xmgame/index',
} as const;

export const COOKIE_DOMAINS = ['secure.xserver.ne.jp', 'www.xserver.ne.jp'] as const;

// ============================================================================
// TIMEOUTS (centralized for easy tuning)
// ============================================================================

export const TIMEOUTS = {
  // Pause after a successful click so async UI updates render
  CLICK_SETTLE: 250,
  // Pause after navigation once network is idle
  NAVIGATION_SETTLE: 500,
  // Pause after scrolling to the page bottom
  SCROLL_SETTLE: 400,
  // Row-level "ゲーム管理" buttons
  ROW_ACTION: 1500,
  // Agreement labels and checkboxes
  AGREEMENT: 800,
} as const;

// Agreement checkboxes ticked per pass
export const MAX_AGREEMENT_CHECKBOXES = 5;

// Rows walked when no direct management control is found
export const MAX_ROWS_SCANNED = 10;

// ============================================================================
// TEXT CONSTANTS
// ============================================================================

export const DEFAULT_LABELS: PanelLabels = {
  loginMarkers: ['ログアウト', 'マイページ', 'アカウント', 'お知らせ'],
  loginButton: ['ログイン', 'ログインする', 'サインイン', 'ログオン', 'ログインへ'],
  emailLabels: ['メールアドレス', 'ログインID', 'アカウントID', 'ID', 'メール'],
  passwordLabels: ['パスワード', 'Password'],
  managementAction: 'ゲーム管理',
  upgrade: [
    'アップグレード・期限延長',
    'アップグレード/期限延長',
    'アップグレード ・ 期限延長',
    '期限延長',
    '期限を延長する',
    '更新',
    '更新手続き',
    'プラン変更・期限延長',
    'プラン変更',
  ],
  detail: ['詳細', '管理', '設定', 'ゲーム詳細', 'サービス詳細', '契約情報', 'メニュー'],
  contract: ['契約', '契約情報', '料金', 'お支払い', '支払い', '請求', '更新', '延長', 'プラン変更'],
  extendEntry: ['期限を延長する', '延長する'],
  agreementKeywords: ['同意', '確認', '承諾', '同意します', '確認しました', '規約', '注意事項'],
  confirm: [
    '確認画面に進む',
    '確認へ進む',
    '確認画面へ',
    '確認画面へ進む',
    '申込内容を確認',
    '申し込み内容を確認',
    '申込み内容を確認',
    '確認する',
    '次へ',
    '次に進む',
    '進む',
  ],
  submit: [
    '期限を延長する',
    '延長する',
    '実行する',
    '延長を確定する',
    '確定する',
    'この内容で申し込む',
    '申し込む',
    '申込む',
  ],
  success: [
    '延長しました',
    '延長が完了',
    '手続きが完了',
    '完了しました',
    '更新しました',
    '受け付けました',
  ],
};

// ============================================================================
// ATTRIBUTE PATTERNS
// ============================================================================

/**
 * Quotes a value for use inside a CSS attribute or :has-text() selector
 */
export function cssString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Generic attribute patterns tried for a label after role and text lookups
 */
export function attributePatternsFor(label: string): string[] {
  const q = cssString(label);
  return [`a:has-text(${q})`, `button:has-text(${q})`, `input[value*=${q}]`, `label:has-text(${q})`];
}

export const EMAIL_INPUT_SELECTORS = [
  'input[type="email"]',
  'input[name*="mail"]',
  'input[id*="mail"]',
  'input[name*="login"]',
  'input[name*="account"]',
  'input[name*="user"]',
  'input[name*="id"]',
  'input[id*="login"]',
  'input[id*="account"]',
  'input[id*="user"]',
  'input[id*="id"]',
] as const;

export const PASSWORD_INPUT_SELECTORS = [
  'input[type="password"]',
  'input[name*="pass"]',
  'input[id*="pass"]',
] as const;

export const CHECKBOX_SELECTOR = 'input[type="checkbox"]';

export const TABLE_ROW_SELECTOR = 'tbody tr';
export const ANY_ROW_SELECTOR = 'tr';

/**
 * Selectors for the management control inside one table row
 */
export function rowActionSelectors(action: string): string[] {
  const q = cssString(action);
  return [
    `button:has-text(${q})`,
    `[role="button"]:has-text(${q})`,
    `a:has-text(${q})`,
    `:is(button,a,div,span)[class*="btn"]:has-text(${q})`,
    `:is(button,a,div,span):has-text(${q})`,
  ];
}

/**
 * Selectors for the first visible management control: inside a server
 * row first, anywhere on the page last
 */
export function pageActionSelectors(action: string): string[] {
  const q = cssString(action);
  return [
    `${TABLE_ROW_SELECTOR} button:has-text(${q})`,
    `${TABLE_ROW_SELECTOR} [role="button"]:has-text(${q})`,
    `${TABLE_ROW_SELECTOR} a:has-text(${q})`,
    `button:has-text(${q})`,
    `[role="button"]:has-text(${q})`,
    `a:has-text(${q})`,
  ];
}

/**
 * Every surface form the panel may use for a renewal duration
 */
export function durationLabels(hours: number): string[] {
  const h = String(hours);
  return [`+${h}時間延長`, `＋${h}時間延長`, `${h}時間延長`, `+${h}時間`, `＋${h}時間`, `${h}時間`, `${h} 時間`];
}

export function durationValueSelectors(hours: number): string[] {
  const q = cssString(String(hours));
  return [
    `input[type="radio"][value=${q}]`,
    `input[type="radio"][value*=${q}]`,
    `input[value=${q}]`,
    `input[value*=${q}]`,
  ];
}

// Enabled submit controls, tried when no labelled commit control matched
export const SUBMIT_FALLBACK_SELECTORS = [
  'button[type="submit"]:not([disabled])',
  'input[type="submit"]:not([disabled])',
  'button:not([disabled]).is-primary, button:not([disabled]).btn-primary, button:not([disabled]).c-btn--primary',
  'a.button--primary, a.btn-primary',
] as const;
