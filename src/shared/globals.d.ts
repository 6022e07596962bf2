/**
 * Globals shared with the page: MathJax reads its configuration from `window.MathJax`
 * and replaces it with the running engine once loaded. The site may set
 * `window.pageEnhancerOptions` before the bundle runs.
 */
import type { MathJaxConfig, MathJaxRuntime } from './types';

declare global {
  interface Window {
    MathJax?: MathJaxConfig | MathJaxRuntime;
    pageEnhancerOptions?: unknown;
  }
}

export {};
