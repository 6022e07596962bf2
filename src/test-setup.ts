/**
 * Vitest setup file — fills in the browser APIs jsdom leaves out.
 */

import { vi } from 'vitest';

Object.defineProperty(navigator, 'clipboard', {
  configurable: true,
  value: { writeText: vi.fn(() => Promise.resolve()) },
});

// jsdom has no layout, so no scrolling either
Element.prototype.scrollIntoView = vi.fn();
