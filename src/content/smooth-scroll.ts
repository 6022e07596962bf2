import { logInfo } from '../shared/logger';

const BOUND_ATTR = 'data-smooth-scroll';

function decodeFragment(fragment: string): string {
  try {
    return decodeURIComponent(fragment);
  } catch {
    // Malformed escape such as "%E0%A4%A": look the raw text up instead
    return fragment;
  }
}

/**
 * Element targeted by an in-page link (`href="#id"`), looked up by id so that
 * ids which aren't valid selectors (`#1-intro`, `#a.b`) still resolve.
 */
export function resolveFragmentTarget(link: Element): Element | null {
  const href = link.getAttribute('href') ?? '';
  if (!href.startsWith('#')) return null;
  const id = decodeFragment(href.slice(1));
  if (!id) return null;
  return link.ownerDocument.getElementById(id);
}

function onClick(this: HTMLAnchorElement, e: MouseEvent) {
  e.preventDefault();
  const target = resolveFragmentTarget(this);
  if (target) {
    target.scrollIntoView({ behavior: 'smooth', block: 'start' });
  }
}

/**
 * Replace the jump to `#fragment` links with a smooth scroll to their target.
 * Returns how many links were newly bound.
 */
export function bindSmoothScroll(root: ParentNode): number {
  let bound = 0;

  root.querySelectorAll<HTMLAnchorElement>('a[href^="#"]').forEach((link) => {
    if (link.hasAttribute(BOUND_ATTR)) return;
    link.addEventListener('click', onClick);
    link.setAttribute(BOUND_ATTR, 'bound');
    bound++;
  });

  if (bound > 0) logInfo('scroll', `Bound ${bound} in-page links`);
  return bound;
}
