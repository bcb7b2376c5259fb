import { describe, it, expect } from 'vitest';
import { classifyLine } from '../../src/parser/line-classifier.js';

describe('classifyLine', () => {
  it('should tag numbered process headers with a label', () => {
    expect(classifyLine('Process 1.0 Intake')).toEqual({
      role: 'process',
      line: 'Process 1.0 Intake',
      label: 'Process \u2013 1.0 Intake'
    });
    expect(classifyLine('PROCESS: 2.3.1 Vendor onboarding')).toMatchObject({
      role: 'process',
      label: 'Process \u2013 2.3.1 Vendor onboarding'
    });
    expect(classifyLine('Process - 4 Billing')).toMatchObject({ label: 'Process \u2013 4 Billing' });
  });

  it('should tag simple process labels', () => {
    expect(classifyLine('Value')).toMatchObject({ role: 'process', label: 'Value' });
    expect(classifyLine('operational: Field services')).toMatchObject({
      role: 'process',
      label: 'Operational \u2013 Field services'
    });
    expect(classifyLine('Business - Strategy')).toMatchObject({ label: 'Business \u2013 Strategy' });
  });

  it('should not treat prose starting with a label word as a header', () => {
    expect(classifyLine('Value chain review').role).toBe('text');
    expect(classifyLine('Process improvements were noted').role).toBe('text');
  });

  it('should tag section headers', () => {
    expect(classifyLine('Areas for Improvement:').role).toBe('afi-header');
    expect(classifyLine('Area of improvement').role).toBe('afi-header');
    expect(classifyLine('Recommendations:').role).toBe('reco-header');
    expect(classifyLine('RECOMMENDATION').role).toBe('reco-header');
  });

  it('should tag item shapes', () => {
    expect(classifyLine('(Major - Ops)').role).toBe('annotation-only');
    expect(classifyLine('12 - Fix the thing')).toEqual({
      role: 'numbered',
      line: '12 - Fix the thing',
      number: 12,
      body: 'Fix the thing'
    });
    expect(classifyLine('See note (a').role).toBe('parenthesized');
    expect(classifyLine('Plain line').role).toBe('text');
  });
});
