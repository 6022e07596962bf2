import type { ClipboardWriter, EnhancerOptions, FeatureToggles } from './types';

const DEFAULT_COPY_FEEDBACK_MS = 2000;

const DEFAULT_FEATURES: FeatureToggles = {
  math: true,
  copy: true,
  smoothScroll: true,
  tables: true,
};

const FEATURE_KEYS = ['math', 'copy', 'smoothScroll', 'tables'] as const satisfies ReadonlyArray<keyof FeatureToggles>;

export const DEFAULTS: EnhancerOptions = {
  copyFeedbackMs: DEFAULT_COPY_FEEDBACK_MS,
  tableWrapperClass: 'table-wrapper',
  features: DEFAULT_FEATURES,
  verbose: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isClipboardWriter(value: unknown): value is ClipboardWriter {
  return isRecord(value) && typeof value.writeText === 'function';
}

function resolveFeatures(input: unknown): FeatureToggles {
  const features = { ...DEFAULT_FEATURES };
  if (!isRecord(input)) return features;
  for (const key of FEATURE_KEYS) {
    const value = input[key];
    if (typeof value === 'boolean') features[key] = value;
  }
  return features;
}

/**
 * Merge page-supplied options (e.g. `window.pageEnhancerOptions`) over the defaults.
 * Fields of the wrong type are ignored.
 */
export function resolveOptions(input?: unknown): EnhancerOptions {
  if (!isRecord(input)) return { ...DEFAULTS, features: { ...DEFAULT_FEATURES } };

  const options: EnhancerOptions = { ...DEFAULTS, features: resolveFeatures(input.features) };

  const { copyFeedbackMs, tableWrapperClass, verbose, clipboard } = input;
  if (typeof copyFeedbackMs === 'number' && Number.isFinite(copyFeedbackMs) && copyFeedbackMs >= 0) {
    options.copyFeedbackMs = copyFeedbackMs;
  }
  // Must be usable as a single class token
  if (typeof tableWrapperClass === 'string' && /^[A-Za-z_-][\w-]*$/.test(tableWrapperClass)) {
    options.tableWrapperClass = tableWrapperClass;
  }
  if (typeof verbose === 'boolean') options.verbose = verbose;
  if (isClipboardWriter(clipboard)) options.clipboard = clipboard;

  return options;
}
