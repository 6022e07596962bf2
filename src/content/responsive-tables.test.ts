import { describe, it, expect, beforeEach } from 'vitest';
import { wrapTables } from './responsive-tables';

const options = { tableWrapperClass: 'table-wrapper' };

beforeEach(() => {
  document.body.innerHTML = '';
});

describe('wrapTables', () => {
  it('moves the table into a horizontally scrollable div', () => {
    document.body.innerHTML = '<table id="t"><tr><td>1</td></tr></table>';
    expect(wrapTables(document, options)).toBe(1);

    const table = document.getElementById('t');
    const wrapper = table?.parentElement;
    expect(wrapper?.tagName).toBe('DIV');
    expect(wrapper?.className).toBe('table-wrapper');
    expect(wrapper?.style.overflowX).toBe('auto');
    expect(wrapper?.parentElement).toBe(document.body);
    expect(wrapper?.children).toHaveLength(1);
  });

  it('keeps the table in its original position', () => {
    document.body.innerHTML = '<p id="before"></p><table id="t"></table><p id="after"></p>';
    wrapTables(document, options);

    const children = Array.from(document.body.children);
    expect(children.map((c) => c.id)).toEqual(['before', '', 'after']);
    expect(children[1].firstElementChild?.id).toBe('t');
  });

  it('leaves rows, cells and attributes untouched', () => {
    document.body.innerHTML = `
      <table id="t" class="data" data-sortable="true">
        <thead><tr><th>a</th><th>b</th></tr></thead>
        <tbody><tr><td>1</td><td>2</td></tr><tr><td>3</td><td>4</td></tr></tbody>
      </table>
    `;
    const before = document.getElementById('t')?.outerHTML;
    wrapTables(document, options);

    const table = document.getElementById('t');
    expect(table?.outerHTML).toBe(before);
    expect(table?.querySelectorAll('tr')).toHaveLength(3);
    expect(table?.querySelectorAll('td')).toHaveLength(4);
  });

  it('never nests wrappers on repeated calls', () => {
    document.body.innerHTML = '<table></table><section><table></table></section>';
    expect(wrapTables(document, options)).toBe(2);
    expect(wrapTables(document, options)).toBe(0);
    expect(document.querySelectorAll('.table-wrapper')).toHaveLength(2);
    expect(document.querySelectorAll('.table-wrapper .table-wrapper')).toHaveLength(0);
  });

  it('skips tables the page already wrapped', () => {
    document.body.innerHTML = '<div class="table-wrapper"><table></table></div>';
    expect(wrapTables(document, options)).toBe(0);
    expect(document.querySelectorAll('div')).toHaveLength(1);
  });

  it('uses the configured wrapper class', () => {
    document.body.innerHTML = '<table id="t"></table>';
    wrapTables(document, { tableWrapperClass: 'scroll-x' });
    expect(document.getElementById('t')?.parentElement?.className).toBe('scroll-x');
  });

  it('returns 0 when there are no tables', () => {
    document.body.innerHTML = '<p>No tables here</p>';
    expect(wrapTables(document, options)).toBe(0);
  });
});
