import type { AfiItem, OutputRecord } from '../types/records.js';
import { tidy } from '../core/text-pipeline/normalizer.js';
import { extractAnnotation, extractAnnotationAcrossLines } from './annotation.js';
import { RecommendationAccumulator, associate, findNumberCollisions, resolveNumbers } from './associator.js';
import { classifyLine, type LineRole, type TaggedLine } from './line-classifier.js';

export type SectionState = 'neutral' | 'afi' | 'reco';

export interface ParserContext {
  readonly lines: readonly string[];
  readonly sourceFileName: string;
  /** Index of the line being handled; handlers advance it past consumed lines. */
  cursor: number;
  state: SectionState;
  label: string;
  items: AfiItem[];
  lastItemIndex: number | null;
  recommendations: RecommendationAccumulator;
  records: OutputRecord[];
  onCollision?: (label: string, numbers: number[]) => void;
}

type Handler<R extends LineRole = LineRole> = (ctx: ParserContext, line: Extract<TaggedLine, { role: R }>) => void;

type HandlerTable = {
  [S in SectionState]: { [R in LineRole]?: Handler<R> };
};

export function createParserContext(
  lines: readonly string[],
  sourceFileName: string,
  onCollision?: ParserContext['onCollision']
): ParserContext {
  return {
    lines,
    sourceFileName,
    cursor: 0,
    state: 'neutral',
    label: '',
    items: [],
    lastItemIndex: null,
    recommendations: new RecommendationAccumulator(),
    records: [],
    onCollision
  };
}

/**
 * Emits the rows of the current process block. Blocks holding only
 * recommendations produce no rows.
 */
export function flushBlock(ctx: ParserContext): void {
  ctx.recommendations.flush();
  if (ctx.items.length > 0) {
    const collisions = findNumberCollisions(resolveNumbers(ctx.items));
    if (collisions.length > 0) ctx.onCollision?.(ctx.label, collisions);

    const block = { label: ctx.label, items: ctx.items, recommendations: ctx.recommendations.toRecord() };
    ctx.records.push(...associate(block, ctx.sourceFileName));
  }
}

function startBlock(ctx: ParserContext, label: string): void {
  ctx.state = 'neutral';
  ctx.label = label;
  ctx.items = [];
  ctx.lastItemIndex = null;
  ctx.recommendations = new RecommendationAccumulator();
}

function addItem(ctx: ParserContext, item: AfiItem): void {
  ctx.items.push(item);
  ctx.lastItemIndex = ctx.items.length - 1;
}

const onProcess: Handler<'process'> = (ctx, tagged) => {
  flushBlock(ctx);
  startBlock(ctx, tagged.label);
};

const onAfiHeader: Handler<'afi-header'> = (ctx) => {
  ctx.recommendations.flush();
  ctx.state = 'afi';
  ctx.lastItemIndex = null;
};

const onRecoHeader: Handler<'reco-header'> = (ctx) => {
  ctx.recommendations.flush();
  ctx.state = 'reco';
};

const HEADER_HANDLERS = {
  process: onProcess,
  'afi-header': onAfiHeader,
  'reco-header': onRecoHeader
};

const appendRecommendation = (ctx: ParserContext, tagged: TaggedLine): void => {
  ctx.recommendations.append(tidy(tagged.line));
};

const TABLE: HandlerTable = {
  neutral: {
    ...HEADER_HANDLERS
  },
  afi: {
    ...HEADER_HANDLERS,
    'annotation-only': (ctx, tagged) => {
      const { classification, entity } = extractAnnotation(tagged.line);
      if (ctx.lastItemIndex === null || !(classification || entity)) return;
      const last = ctx.items[ctx.lastItemIndex];
      if (!last.classification) last.classification = classification;
      if (!last.entity) last.entity = entity;
    },
    numbered: (ctx, tagged) => {
      const found = extractAnnotationAcrossLines(ctx.lines, ctx.cursor, tagged.body);
      addItem(ctx, {
        number: tagged.number,
        text: found.text,
        classification: found.classification,
        entity: found.entity
      });
      ctx.cursor = Math.max(ctx.cursor, found.lastIndex);
    },
    parenthesized: (ctx, tagged) => {
      const found = extractAnnotationAcrossLines(ctx.lines, ctx.cursor, tagged.line);
      if (!found.found) return;
      addItem(ctx, {
        number: null,
        text: found.text,
        classification: found.classification,
        entity: found.entity
      });
      ctx.cursor = Math.max(ctx.cursor, found.lastIndex);
    }
  },
  reco: {
    ...HEADER_HANDLERS,
    numbered: (ctx, tagged) => {
      ctx.recommendations.open(String(tagged.number), tidy(tagged.body));
    },
    'annotation-only': appendRecommendation,
    parenthesized: appendRecommendation,
    text: appendRecommendation
  }
};

function dispatch(ctx: ParserContext, tagged: TaggedLine): void {
  // Narrowed per role so each handler receives its own line shape.
  const row = TABLE[ctx.state];
  switch (tagged.role) {
    case 'process':
      return row.process?.(ctx, tagged);
    case 'afi-header':
      return row['afi-header']?.(ctx, tagged);
    case 'reco-header':
      return row['reco-header']?.(ctx, tagged);
    case 'annotation-only':
      return row['annotation-only']?.(ctx, tagged);
    case 'numbered':
      return row.numbered?.(ctx, tagged);
    case 'parenthesized':
      return row.parenthesized?.(ctx, tagged);
    case 'text':
      return row.text?.(ctx, tagged);
  }
}

export function step(ctx: ParserContext): void {
  const line = ctx.lines[ctx.cursor];
  dispatch(ctx, classifyLine(line));
  ctx.cursor += 1;
}

/**
 * Parses one document's normalized lines into output records. Never throws on
 * malformed content; unrecognized lines are skipped.
 */
export function parseLines(
  lines: readonly string[],
  sourceFileName: string,
  onCollision?: ParserContext['onCollision']
): OutputRecord[] {
  const ctx = createParserContext(lines, sourceFileName, onCollision);
  while (ctx.cursor < ctx.lines.length) {
    step(ctx);
  }
  flushBlock(ctx);
  return ctx.records;
}
