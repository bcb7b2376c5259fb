import type { AfiItem, OutputRecord, ProcessBlock, ResolvedAfiItem } from '../types/records.js';
import { tidy } from '../core/text-pipeline/normalizer.js';
import { extractAnnotation } from './annotation.js';

export const RECOMMENDATION_SEPARATOR = ' | ';

/**
 * Collects recommendation fragments per item number. Fragments of the open key
 * are merged on {@link flush}; a key seen again later in the block is appended to.
 */
export class RecommendationAccumulator {
  private merged = new Map<string, string>();
  private openKey: string | null = null;
  private parts: string[] = [];

  open(key: string, seed?: string): void {
    this.flush();
    this.openKey = key;
    this.parts = seed === undefined ? [] : [seed];
  }

  append(fragment: string): void {
    if (this.openKey === null) {
      this.openKey = '1';
    }
    this.parts.push(fragment);
  }

  flush(): void {
    if (this.openKey !== null) {
      const text = this.parts.filter((p) => p.length > 0).join(RECOMMENDATION_SEPARATOR);
      if (text) {
        const prev = this.merged.get(this.openKey);
        this.merged.set(this.openKey, prev ? `${prev}${RECOMMENDATION_SEPARATOR}${text}` : text);
      }
    }
    this.openKey = null;
    this.parts = [];
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.merged);
  }
}

/**
 * Gives every unnumbered item the next value of a counter starting at 1, in
 * insertion order. Explicit numbers are left as they are, even when they
 * coincide with a fallback number.
 */
export function resolveNumbers(items: readonly AfiItem[]): ResolvedAfiItem[] {
  let seq = 1;
  return items.map((item) => {
    if (item.number !== null) return { ...item, number: item.number };
    return { ...item, number: seq++ };
  });
}

export function findNumberCollisions(items: readonly ResolvedAfiItem[]): number[] {
  const seen = new Set<number>();
  const dupes = new Set<number>();
  for (const item of items) {
    if (seen.has(item.number)) dupes.add(item.number);
    seen.add(item.number);
  }
  return [...dupes].sort((a, b) => a - b);
}

/**
 * Runs the annotation pass once more over the stored AFI text; fields already
 * set are kept. The written text is always tidied.
 */
export function finalizeRecord(record: OutputRecord): OutputRecord {
  const again = extractAnnotation(record.afiText);
  return {
    ...record,
    afiText: tidy(again.text),
    classification: record.classification || again.classification,
    entity: record.entity || again.entity
  };
}

export function associate(block: ProcessBlock, sourceFileName: string): OutputRecord[] {
  const resolved = resolveNumbers(block.items);
  // Array#sort is stable, so equal numbers keep insertion order.
  const ordered = [...resolved].sort((a, b) => a.number - b.number);

  return ordered.map((item) =>
    finalizeRecord({
      afiText: item.text,
      classification: item.classification,
      entity: item.entity,
      recommendationText: block.recommendations[String(item.number)] ?? '',
      processLabel: block.label,
      sourceFileName
    })
  );
}
