import type { EnhanceReport, EnhancerOptions } from '../shared/types';
import { DEFAULTS } from '../shared/options';
import { logError, errorMessage, type LogEntry } from '../shared/logger';
import { attachCopyButtons } from './copy-buttons';
import { bindSmoothScroll } from './smooth-scroll';
import { wrapTables } from './responsive-tables';

/** Run one behavior; a throw is logged and counted as nothing enhanced */
function runBehavior(source: LogEntry['source'], fn: () => number): number {
  try {
    return fn();
  } catch (e) {
    logError(source, `Enhancement failed: ${errorMessage(e)}`);
    return 0;
  }
}

/**
 * Attach the page affordances (copy buttons, smooth in-page scrolling, scrollable
 * tables) to everything under `root`.
 *
 * Safe to call again on the same DOM, e.g. after new content is swapped in: elements
 * handled before are skipped, so the report only counts what this call added.
 * Never throws.
 */
export function initialize(root: ParentNode, options: EnhancerOptions = DEFAULTS): EnhanceReport {
  const { features } = options;

  return {
    copyButtons: features.copy ? runBehavior('copy', () => attachCopyButtons(root, options)) : 0,
    scrollLinks: features.smoothScroll ? runBehavior('scroll', () => bindSmoothScroll(root)) : 0,
    tables: features.tables ? runBehavior('tables', () => wrapTables(root, options)) : 0,
  };
}
