/** Copy-to-clipboard buttons on rendered code blocks */

import type { ClipboardWriter, CopyButtonState, EnhancerOptions } from '../shared/types';
import { logInfo, logWarn, errorMessage } from '../shared/logger';

const COPY_BUTTON_CLASS = 'md-clipboard md-icon';

const ATTACHED_ATTR = 'data-copy-button';

const CLIPBOARD_ICON =
  '<svg viewBox="0 0 24 24"><path d="M19,21H8V7H19M19,5H8A2,2 0 0,0 6,7V21A2,2 0 0,0 8,23H19A2,2 0 0,0 21,21V7A2,2 0 0,0 19,5M16,1H4A2,2 0 0,0 2,3V17H4V3H16V1Z"></path></svg>';
const CHECK_ICON =
  '<svg viewBox="0 0 24 24"><path d="M21,7L9,19L3.5,13.5L4.91,12.09L9,16.17L19.59,5.59L21,7Z"></path></svg>';

const ICONS: Record<CopyButtonState, string> = {
  idle: CLIPBOARD_ICON,
  copied: CHECK_ICON,
};

/** Pending revert-to-idle timer per button */
const revertTimers = new WeakMap<HTMLButtonElement, ReturnType<typeof setTimeout>>();

type CopyOptions = Pick<EnhancerOptions, 'copyFeedbackMs' | 'clipboard'>;

function setState(button: HTMLButtonElement, state: CopyButtonState) {
  button.dataset.state = state;
  button.innerHTML = ICONS[state];
}

function cancelRevert(button: HTMLButtonElement) {
  const timer = revertTimers.get(button);
  if (timer !== undefined) {
    clearTimeout(timer);
    revertTimers.delete(button);
  }
}

function scheduleRevert(button: HTMLButtonElement, delayMs: number) {
  cancelRevert(button);
  revertTimers.set(
    button,
    setTimeout(() => {
      revertTimers.delete(button);
      setState(button, 'idle');
    }, delayMs)
  );
}

function defaultClipboard(): ClipboardWriter | undefined {
  return typeof navigator !== 'undefined' ? navigator.clipboard : undefined;
}

/**
 * Write the block's text to the clipboard and flash the success glyph on `button`.
 * Resolves `false` instead of rejecting when the clipboard is missing or refuses.
 */
export async function copyCode(button: HTMLButtonElement, code: Element, options: CopyOptions): Promise<boolean> {
  const clipboard = options.clipboard ?? defaultClipboard();
  if (!clipboard) {
    logWarn('copy', 'Clipboard API unavailable');
    return false;
  }

  try {
    await clipboard.writeText(code.textContent ?? '');
  } catch (e) {
    logWarn('copy', `Copy failed: ${errorMessage(e)}`);
    return false;
  }

  setState(button, 'copied');
  scheduleRevert(button, options.copyFeedbackMs);
  return true;
}

function createButton(doc: Document): HTMLButtonElement {
  const button = doc.createElement('button');
  button.className = COPY_BUTTON_CLASS;
  button.type = 'button';
  button.title = 'Copy to clipboard';
  button.style.position = 'absolute';
  button.style.top = '4px';
  button.style.right = '4px';
  setState(button, 'idle');
  return button;
}

/**
 * Add one copy button to every non-empty `pre > code` under `root`.
 * Blocks handled by an earlier call are skipped. Returns the number of buttons added.
 */
export function attachCopyButtons(root: ParentNode, options: CopyOptions): number {
  let added = 0;

  root.querySelectorAll('pre > code').forEach((code) => {
    if (code.hasAttribute(ATTACHED_ATTR)) return;
    if ((code.textContent ?? '').trim().length === 0) return;

    const pre = code.parentElement;
    if (!(pre instanceof HTMLElement)) return;

    const button = createButton(pre.ownerDocument);
    button.addEventListener('click', () => {
      void copyCode(button, code, options);
    });

    pre.style.position = 'relative';
    pre.appendChild(button);
    code.setAttribute(ATTACHED_ATTR, 'attached');
    added++;
  });

  if (added > 0) logInfo('copy', `Attached ${added} copy buttons`);
  return added;
}
