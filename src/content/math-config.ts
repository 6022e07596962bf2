import type { MathJaxConfig, MathJaxRuntime } from '../shared/types';
import { logInfo, logWarn } from '../shared/logger';

/**
 * MathJax setup matching the content's arithmatex output: `\( \)` inline,
 * `\[ \]` display, and only `.arithmatex` subtrees are typeset.
 */
export function buildMathJaxConfig(): MathJaxConfig {
  return {
    tex: {
      inlineMath: [['\\(', '\\)']],
      displayMath: [['\\[', '\\]']],
      processEscapes: true,
      processEnvironments: true,
    },
    options: {
      ignoreHtmlClass: '.*|',
      processHtmlClass: 'arithmatex',
    },
  };
}

function isRunning(value: Window['MathJax']): value is MathJaxRuntime {
  return value !== undefined && 'typesetPromise' in value && typeof value.typesetPromise === 'function';
}

/**
 * Publish the configuration on `window.MathJax`. Has to run before the MathJax
 * script loads; once the engine is up its global is left alone.
 * Returns whether the configuration was installed.
 */
export function installMathJaxConfig(win: Window = window): boolean {
  if (isRunning(win.MathJax)) {
    logWarn('math', 'MathJax already started, configuration not applied');
    return false;
  }
  win.MathJax = buildMathJaxConfig();
  logInfo('math', 'MathJax configuration installed');
  return true;
}
