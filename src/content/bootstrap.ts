import { resolveOptions } from '../shared/options';
import { setVerbose, logInfo } from '../shared/logger';
import { installMathJaxConfig } from './math-config';
import { initialize } from './page-enhancer';

/** Install the math config now, enhance once the DOM is parsed */
export function start(win: Window = window): void {
  const options = resolveOptions(win.pageEnhancerOptions);
  setVerbose(options.verbose);

  // MathJax reads its config when its own script runs, which may be before DOMContentLoaded
  if (options.features.math) installMathJaxConfig(win);

  const doc = win.document;
  const run = () => {
    const report = initialize(doc, options);
    logInfo('system', 'Page enhanced', { ...report });
  };

  if (doc.readyState === 'loading') {
    doc.addEventListener('DOMContentLoaded', run, { once: true });
  } else {
    run();
  }
}
