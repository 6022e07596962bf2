/** A pair of opening/closing math delimiters, e.g. `["\\(", "\\)"]` */
export type MathDelimiter = [open: string, close: string];

/** Configuration object read by MathJax 3 from `window.MathJax` before it starts */
export interface MathJaxConfig {
  tex: {
    inlineMath: MathDelimiter[];
    displayMath: MathDelimiter[];
    processEscapes: boolean;
    processEnvironments: boolean;
  };
  options: {
    /** Regex source; elements whose class matches are skipped */
    ignoreHtmlClass: string;
    /** Class that opts an element (and its subtree) back into typesetting */
    processHtmlClass: string;
  };
}

/** Subset of the running MathJax global, present once the engine has started */
export interface MathJaxRuntime {
  typesetPromise: (elements?: Element[]) => Promise<void>;
}

/** Anything that can take text for the system clipboard (`navigator.clipboard` fits) */
export interface ClipboardWriter {
  writeText(text: string): Promise<void>;
}

export type CopyButtonState = 'idle' | 'copied';

export interface FeatureToggles {
  math: boolean;
  copy: boolean;
  smoothScroll: boolean;
  tables: boolean;
}

export interface EnhancerOptions {
  /** How long the success glyph stays on a copy button */
  copyFeedbackMs: number;
  tableWrapperClass: string;
  features: FeatureToggles;
  /** Echo info-level log entries to the console */
  verbose: boolean;
  /** Overrides `navigator.clipboard` */
  clipboard?: ClipboardWriter;
}

/** Elements newly enhanced by one `initialize` call */
export interface EnhanceReport {
  copyButtons: number;
  scrollLinks: number;
  tables: number;
}
