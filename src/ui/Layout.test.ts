import { describe, it, expect } from 'vitest';
import { calculateLayout } from './Layout.js';

describe('calculateLayout', () => {
  it('splits the width between the panes', () => {
    const d = calculateLayout(24, 81);
    expect(d.leftWidth).toBe(40);
    expect(d.rightLeft).toBe(40);
    expect(d.rightWidth).toBe(41);
  });

  it('leaves one row each for header and footer', () => {
    const d = calculateLayout(24, 80);
    expect(d.contentTop).toBe(1);
    expect(d.contentHeight).toBe(22);
    expect(d.listHeight).toBe(20);
    expect(d.footerRow).toBe(23);
  });

  it('keeps at least one list row on tiny terminals', () => {
    expect(calculateLayout(3, 20).listHeight).toBe(1);
  });
});
