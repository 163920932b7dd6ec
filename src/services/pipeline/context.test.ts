import { describe, it, expect } from 'vitest';
import { assembleContext } from './context.js';
import { ContextAssemblyError } from '../../types/errors.js';
import type { RetrievedDocument } from '../../types/models.js';

const doc = (name: string, distance: number): RetrievedDocument => ({
  document: { name, kind: 'table', content: `Table: ${name}` },
  distance,
});

describe('assembleContext', () => {
  it('formats the relevance score with two decimals', () => {
    expect(assembleContext([doc('orders', 0.1)])).toBe(
      'Relevance Score: 0.90\nTable: orders\n---'
    );
  });

  it('keeps rank order', () => {
    expect(assembleContext([doc('orders', 0.05), doc('customers', 0.2)])).toBe(
      [
        'Relevance Score: 0.95',
        'Table: orders',
        '---',
        'Relevance Score: 0.80',
        'Table: customers',
        '---',
      ].join('\n')
    );
  });

  it('converts l2 distances', () => {
    expect(assembleContext([doc('orders', 0)], 'l2')).toBe(
      'Relevance Score: 1.00\nTable: orders\n---'
    );
  });

  it('rejects an empty list', () => {
    expect(() => assembleContext([])).toThrow(ContextAssemblyError);
  });
});
