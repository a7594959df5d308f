import fsp from 'node:fs/promises';
import path from 'node:path';
import type { BrowserPage } from './browser/types.js';
import { logger } from './logger.js';

/**
 * Post-hoc debugging captures taken at named checkpoints.
 * Implementations never throw.
 */
export interface DiagnosticCapture {
  screenshot(label: string): Promise<void>;
  dumpHtml(label: string): Promise<void>;
}

export interface FileDiagnosticsOptions {
  screenshotDir: string;
  pageDumpDir: string;
  now?: () => Date;
}

export function safeLabel(label: string): string {
  return label.replace(/[^a-zA-Z0-9_\-.]+/g, '_');
}

/**
 * Full-page PNGs and raw HTML named `<unix-seconds>_<label>`
 */
export class FileDiagnostics implements DiagnosticCapture {
  private readonly now: () => Date;

  constructor(
    private readonly page: BrowserPage,
    private readonly options: FileDiagnosticsOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private fileName(label: string, ext: string): string {
    const seconds = Math.floor(this.now().getTime() / 1000);
    return `${seconds}_${safeLabel(label)}.${ext}`;
  }

  async screenshot(label: string): Promise<void> {
    try {
      await fsp.mkdir(this.options.screenshotDir, { recursive: true });
      const filepath = path.join(this.options.screenshotDir, this.fileName(label, 'png'));
      await this.page.screenshot({ path: filepath, fullPage: true });
      logger.debug({ path: filepath }, 'Saved screenshot');
    } catch (err) {
      logger.warn({ label, error: err instanceof Error ? err.message : String(err) }, 'Screenshot failed');
    }
  }

  async dumpHtml(label: string): Promise<void> {
    try {
      await fsp.mkdir(this.options.pageDumpDir, { recursive: true });
      const filepath = path.join(this.options.pageDumpDir, this.fileName(label, 'html'));
      await fsp.writeFile(filepath, await this.page.content(), 'utf-8');
      logger.debug({ path: filepath }, 'Saved page html');
    } catch (err) {
      logger.warn({ label, error: err instanceof Error ? err.message : String(err) }, 'Dump html failed');
    }
  }
}

