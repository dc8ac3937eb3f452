/**
 * Context Resolver Tests
 */

import {
  compareCandidates,
  resolveContext,
  selectWinners,
  type FieldCandidate,
  type ResolveOptions,
} from '@docnamer/shared';

function candidate(overrides: Partial<FieldCandidate>): FieldCandidate {
  return {
    field: 'reference_number',
    value: '123',
    canonical: '123',
    confidence: 0.9,
    span: { start: 0, end: 3 },
    rule_id: 'reference-number.labeled',
    ...overrides,
  };
}

const ORDER = new Map([
  ['reference-number.labeled', 0],
  ['reference-number.bare', 1],
]);

describe('compareCandidates', () => {
  it('prefers higher confidence', () => {
    const strong = candidate({ confidence: 0.95 });
    const weak = candidate({ confidence: 0.7, span: { start: 0, end: 10 } });
    expect(compareCandidates(strong, weak, ORDER)).toBeLessThan(0);
  });

  it('breaks confidence ties by span length', () => {
    const long = candidate({ span: { start: 20, end: 27 } });
    const short = candidate({ span: { start: 0, end: 3 } });
    expect(compareCandidates(long, short, ORDER)).toBeLessThan(0);
  });

  it('then by rule order, then by position', () => {
    const labeled = candidate({ span: { start: 40, end: 43 } });
    const bare = candidate({ rule_id: 'reference-number.bare', span: { start: 0, end: 3 } });
    expect(compareCandidates(labeled, bare, ORDER)).toBeLessThan(0);

    const first = candidate({ span: { start: 5, end: 8 } });
    const second = candidate({ span: { start: 50, end: 53 } });
    expect(compareCandidates(first, second, ORDER)).toBeLessThan(0);
    expect(compareCandidates(second, first, ORDER)).toBeGreaterThan(0);
  });
});

describe('selectWinners', () => {
  it('does not depend on candidate order', () => {
    const candidates = [
      candidate({ value: '777', canonical: '777', rule_id: 'reference-number.bare', span: { start: 30, end: 33 } }),
      candidate({ value: '123', canonical: '123', span: { start: 10, end: 13 } }),
      candidate({ field: 'date', value: '10/03/2024', canonical: '2024-03-10', rule_id: 'date.numeric' }),
    ];

    const forward = selectWinners(candidates, ORDER);
    const backward = selectWinners([...candidates].reverse(), ORDER);

    expect(forward.get('reference_number')?.value).toBe('123');
    expect(backward.get('reference_number')).toEqual(forward.get('reference_number'));
    expect(forward.get('date')?.canonical).toBe('2024-03-10');
  });
});

describe('resolveContext', () => {
  const options: ResolveOptions = {
    requiredFields: ['document_type', 'reference_number'],
    ruleOrder: ORDER,
    unknownValue: 'UNKNOWN',
    template: '{document_type}_{reference_number}',
  };

  it('takes the weakest required field as overall confidence', () => {
    const context = resolveContext(
      'doc-1',
      [
        candidate({ confidence: 0.95 }),
        candidate({ field: 'document_type', value: 'CONTRATO', canonical: 'CONTRATO', confidence: 0.8, rule_id: 'document-type.heading' }),
        candidate({ field: 'farm', value: 'Contendas', canonical: 'Contendas', confidence: 0.1, rule_id: 'farm.labeled' }),
      ],
      options
    );

    expect(context.document_id).toBe('doc-1');
    expect(context.overall_confidence).toBe(0.8);
    expect(context.field_confidences).toEqual({ reference_number: 0.95, document_type: 0.8, farm: 0.1 });
    expect(context.required_fields).toEqual(['document_type', 'reference_number']);
    expect(context.template).toBe('{document_type}_{reference_number}');
  });

  it('fills missing required fields with the unknown value', () => {
    const context = resolveContext('doc-2', [candidate({ confidence: 0.95 })], options);

    expect(context.fields.document_type).toEqual({
      value: 'UNKNOWN',
      canonical: 'UNKNOWN',
      confidence: 0,
      rule_id: null,
      span: null,
    });
    expect(context.overall_confidence).toBe(0);
  });

  it('is zero when nothing is required', () => {
    const context = resolveContext('doc-3', [candidate({})], { ...options, requiredFields: [] });
    expect(context.overall_confidence).toBe(0);
  });

  it('returns a frozen context', () => {
    const context = resolveContext('doc-4', [candidate({})], { ...options, requiredFields: ['reference_number'] });
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.fields.reference_number)).toBe(true);
  });
});
