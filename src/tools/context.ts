import type { AppConfig } from '../config.js';
import { PhoneCleaner } from '../phones/index.js';
import { errorMessage } from '../utils/index.js';

export interface ToolContext {
  config: AppConfig;
  cleaner: PhoneCleaner;
}

export function createToolContext(config: AppConfig): ToolContext {
  return { config, cleaner: new PhoneCleaner(config.cleaner) };
}

/** The shared cleaner, or a one-off cleaner when a call overrides the Mexico policy. */
export function cleanerFor(ctx: ToolContext, mexicoMobileDisambiguator?: boolean): PhoneCleaner {
  if (mexicoMobileDisambiguator === undefined
    || mexicoMobileDisambiguator === ctx.cleaner.options.mexicoMobileDisambiguatorEnabled) {
    return ctx.cleaner;
  }
  return new PhoneCleaner({ ...ctx.config.cleaner, mexicoMobileDisambiguatorEnabled: mexicoMobileDisambiguator });
}

export function jsonResult(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorResult(err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}
