import juice from 'juice';
import { Clock, systemClock } from '../clock';

/**
 * Moves <style> and linked stylesheet rules onto style attributes, so the
 * markup survives mail clients that drop <head>.
 */
export interface StyleInliner {
  inline(html: string): Promise<string>;
}

export interface JuiceStyleInlinerOptions {
  /** Bound on fetching linked stylesheets */
  timeoutMs?: number;
  /** Base for relative stylesheet URLs */
  relativeTo?: string;
}

export const DEFAULT_INLINE_TIMEOUT_MS = 10_000;

export class StyleInlineError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'StyleInlineError';
  }
}

export class JuiceStyleInliner implements StyleInliner {
  private readonly timeoutMs: number;

  constructor(
    private readonly options: JuiceStyleInlinerOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INLINE_TIMEOUT_MS;
  }

  inline(html: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const timer = this.clock.setTimer(() => {
        if (!settled) {
          settled = true;
          reject(new StyleInlineError(`Stylesheet fetch timed out after ${this.timeoutMs}ms`));
        }
      }, this.timeoutMs);

      juice.juiceResources(
        html,
        {
          preserveMediaQueries: true,
          preserveFontFaces: true,
          removeStyleTags: false,
          webResources: {
            relativeTo: this.options.relativeTo,
            links: true,
            images: false,
            scripts: false,
            svgs: false,
            // Non-2xx stylesheet responses surface as errors
            strict: true
          }
        },
        (error: Error | null, result: string) => {
          if (settled) {
            return;
          }
          settled = true;
          timer.cancel();
          if (error) {
            reject(new StyleInlineError(`Style inlining failed: ${error.message}`, error));
          } else {
            resolve(result);
          }
        }
      );
    });
  }
}

/**
 * Inline styles, or hand back the markup unchanged when inlining fails.
 */
export async function inlineStylesOrOriginal(inliner: StyleInliner, html: string): Promise<string> {
  try {
    return await inliner.inline(html);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[StyleInliner] Falling back to original markup: ${message}`);
    return html;
  }
}
