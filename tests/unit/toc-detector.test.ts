import { describe, it, expect } from 'vitest';
import { isTocPage } from '../../src/sources/toc-detector.js';

describe('isTocPage', () => {
  it('should detect a contents title', () => {
    expect(isTocPage(['Table of Contents', 'Introduction'])).toBe(true);
    expect(isTocPage(['CONTENTS'])).toBe(true);
  });

  it('should detect three or more dot-leader lines', () => {
    expect(
      isTocPage(['Introduction ........ 3', 'Scope ........ 4', 'Findings ........ 7'])
    ).toBe(true);
  });

  it('should not flag two dot-leader lines', () => {
    expect(isTocPage(['Introduction ........ 3', 'Scope ........ 4', 'Findings'])).toBe(false);
  });

  it('should not flag a content page', () => {
    expect(isTocPage(['Process 1.0 Intake', 'Areas for Improvement:', '1 - Bad process (Major - Ops)'])).toBe(false);
  });
});
