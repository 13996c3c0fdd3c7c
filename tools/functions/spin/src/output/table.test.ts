import { describe, it, expect } from 'vitest';

import { renderTable } from './table';

describe('renderTable', () => {
  it('aligns columns with two-space gutters', () => {
    const table = renderTable(
      ['ID', 'STATE'],
      [
        ['i-1', 'running'],
        ['i-0123', 'pending'],
      ],
    );

    expect(table.split('\n')).toEqual(['ID      STATE', '------  -------', 'i-1     running', 'i-0123  pending']);
  });

  it('prints header and divider without rows', () => {
    expect(renderTable(['INSTANCE ID', 'RESULT'], [])).toBe('INSTANCE ID  RESULT\n-----------  ------');
  });

  it('pads missing cells and trims trailing space', () => {
    expect(renderTable(['A', 'B'], [['x']]).split('\n')[2]).toBe('x');
  });
});
