import { describe, it, expect } from 'vitest';
import { extractAnnotation, extractAnnotationAcrossLines } from '../../src/parser/annotation.js';

describe('extractAnnotation', () => {
  it('should split a parenthesized classification and entity out of the text', () => {
    expect(extractAnnotation('Improve widget handling (Major - Logistics)')).toEqual({
      text: 'Improve widget handling',
      classification: 'Major',
      entity: 'Logistics',
      found: true
    });
  });

  it('should use the rightmost group', () => {
    const out = extractAnnotation('Check (see annex) records (Other \u2013 Finance)');
    expect(out.text).toBe('Check (see annex) records');
    expect(out.classification).toBe('Other');
    expect(out.entity).toBe('Finance');
  });

  it('should take a group without a hyphen as classification only', () => {
    expect(extractAnnotation('Late reviews (Major)')).toEqual({
      text: 'Late reviews',
      classification: 'Major',
      entity: '',
      found: true
    });
  });

  it('should remove the group from the middle of the text', () => {
    expect(extractAnnotation('Stock (Major - Stores) counts are late').text).toBe('Stock counts are late');
  });

  it('should fall back to a keyword-led annotation', () => {
    expect(extractAnnotation('Missing sign-off Major - Procurement team')).toEqual({
      text: 'Missing sign-off',
      classification: 'Major',
      entity: 'Procurement team',
      found: true
    });
  });

  it('should match the keyword case-insensitively and capitalize it', () => {
    const out = extractAnnotation('Gaps in OTHER - Records');
    expect(out.classification).toBe('Other');
    expect(out.entity).toBe('Records');
    expect(out.text).toBe('Gaps in');
  });

  it('should leave text without an annotation untouched', () => {
    expect(extractAnnotation('Review cadence is unclear.')).toEqual({
      text: 'Review cadence is unclear.',
      classification: '',
      entity: '',
      found: false
    });
  });

  it('should ignore a keyword with no hyphen after it', () => {
    const out = extractAnnotation('Major gaps in training');
    expect(out.found).toBe(false);
    expect(out.text).toBe('Major gaps in training');
  });

  it('should treat an empty group as no annotation', () => {
    const out = extractAnnotation('Text ( - ) more');
    expect(out.found).toBe(false);
    expect(out.text).toBe('Text ( - ) more');
  });
});

describe('extractAnnotationAcrossLines', () => {
  it('should read an annotation split over two lines', () => {
    const lines = ['Improve widget handling (', 'Major - Logistics)'];
    expect(extractAnnotationAcrossLines(lines, 0, lines[0])).toEqual({
      text: 'Improve widget handling',
      classification: 'Major',
      entity: 'Logistics',
      found: true,
      lastIndex: 1
    });
  });

  it('should keep reading until a closing parenthesis', () => {
    const lines = ['Stock counts (Major -', 'Warehouse', 'operations)', 'Next item'];
    const out = extractAnnotationAcrossLines(lines, 0, lines[0]);
    expect(out.text).toBe('Stock counts');
    expect(out.classification).toBe('Major');
    expect(out.entity).toBe('Warehouse operations');
    expect(out.lastIndex).toBe(2);
  });

  it('should use the body passed in rather than the whole line', () => {
    const lines = ['Intro', '3 - Slow refunds (', 'Other - Billing)'];
    const out = extractAnnotationAcrossLines(lines, 1, 'Slow refunds (');
    expect(out.text).toBe('Slow refunds');
    expect(out.entity).toBe('Billing');
    expect(out.lastIndex).toBe(2);
  });

  it('should return the first line unmodified when the group never closes', () => {
    const lines = ['Open item (Major', 'still going'];
    expect(extractAnnotationAcrossLines(lines, 0, lines[0])).toEqual({
      text: 'Open item (Major',
      classification: '',
      entity: '',
      found: false,
      lastIndex: 1
    });
  });

  it('should not consume anything when the last line opens a group', () => {
    const lines = ['Earlier', 'Dangling ('];
    expect(extractAnnotationAcrossLines(lines, 1, lines[1]).lastIndex).toBe(1);
  });

  it('should use the single-line path when the line is closed', () => {
    const lines = ['Weak controls (Major - Treasury)', 'Other - Next'];
    const out = extractAnnotationAcrossLines(lines, 0, lines[0]);
    expect(out.text).toBe('Weak controls');
    expect(out.lastIndex).toBe(0);
  });

  it('should use the single-line path when there is no parenthesis', () => {
    const lines = ['Weak controls Major - Treasury', '(Other - Next)'];
    const out = extractAnnotationAcrossLines(lines, 0, lines[0]);
    expect(out.classification).toBe('Major');
    expect(out.entity).toBe('Treasury');
    expect(out.lastIndex).toBe(0);
  });
});
