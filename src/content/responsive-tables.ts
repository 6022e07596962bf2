import type { EnhancerOptions } from '../shared/types';
import { logInfo } from '../shared/logger';

/**
 * Move every table under `root` into a horizontally scrollable wrapper div.
 * Tables already sitting in a wrapper are left as they are.
 * Returns the number of tables wrapped.
 */
export function wrapTables(root: ParentNode, options: Pick<EnhancerOptions, 'tableWrapperClass'>): number {
  const wrapperClass = options.tableWrapperClass;
  let wrapped = 0;

  root.querySelectorAll('table').forEach((table) => {
    const parent = table.parentElement;
    if (!parent || parent.classList.contains(wrapperClass)) return;

    const wrapper = table.ownerDocument.createElement('div');
    wrapper.className = wrapperClass;
    wrapper.style.overflowX = 'auto';
    parent.insertBefore(wrapper, table);
    wrapper.appendChild(table);
    wrapped++;
  });

  if (wrapped > 0) logInfo('tables', `Wrapped ${wrapped} tables`);
  return wrapped;
}
