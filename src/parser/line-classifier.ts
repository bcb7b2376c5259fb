import { capitalize } from '../core/text-pipeline/normalizer.js';

export type LineRole =
  | 'process'
  | 'afi-header'
  | 'reco-header'
  | 'annotation-only'
  | 'numbered'
  | 'parenthesized'
  | 'text';

export type TaggedLine =
  | { role: 'process'; line: string; label: string }
  | { role: 'afi-header'; line: string }
  | { role: 'reco-header'; line: string }
  | { role: 'annotation-only'; line: string }
  | { role: 'numbered'; line: string; number: number; body: string }
  | { role: 'parenthesized'; line: string }
  | { role: 'text'; line: string };

const PROCESS_RE = /^\s*process\s*[:-]?\s*([0-9]+(?:\.[0-9]+)*)\s+(.+)$/i;
const PROCESS_SIMPLE_RE = /^\s*(Value|Operational|Business)\b(?:\s*[:\-\u2013\u2014]\s*(.+))?$/i;
const AFI_HEADER_RE = /^\s*areas?\s+(for|of)\s+improvement\s*:?\s*$/i;
const RECO_HEADER_RE = /^\s*recommendations?\s*:?\s*$/i;
const ANNOTATION_ONLY_RE = /^\([^)]*\)$/;
export const NUMBERED_ITEM_RE = /^\s*(\d+)\s*-\s*(.+?)\s*$/;

export const LABEL_SEPARATOR = ' – ';

type Classifier = (line: string) => TaggedLine | null;

// Order matters: headers win over item shapes.
const CLASSIFIERS: Classifier[] = [
  (line) => {
    const m = PROCESS_RE.exec(line);
    return m ? { role: 'process', line, label: `Process${LABEL_SEPARATOR}${m[1]} ${m[2]}` } : null;
  },
  (line) => {
    const m = PROCESS_SIMPLE_RE.exec(line);
    if (!m) return null;
    const head = capitalize(m[1] ?? '');
    const tail = m[2] ?? '';
    return { role: 'process', line, label: tail ? `${head}${LABEL_SEPARATOR}${tail}` : head };
  },
  (line) => (AFI_HEADER_RE.test(line) ? { role: 'afi-header', line } : null),
  (line) => (RECO_HEADER_RE.test(line) ? { role: 'reco-header', line } : null),
  (line) => (ANNOTATION_ONLY_RE.test(line) ? { role: 'annotation-only', line } : null),
  (line) => {
    const m = NUMBERED_ITEM_RE.exec(line);
    return m ? { role: 'numbered', line, number: Number.parseInt(m[1] ?? '', 10), body: m[2] ?? '' } : null;
  },
  (line) => (line.includes('(') ? { role: 'parenthesized', line } : null)
];

export function classifyLine(line: string): TaggedLine {
  for (const classify of CLASSIFIERS) {
    const tagged = classify(line);
    if (tagged) return tagged;
  }
  return { role: 'text', line };
}
