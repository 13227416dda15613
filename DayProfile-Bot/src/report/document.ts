export type BlockKind =
  | 'title'
  | 'calendrical'
  | 'lunar'
  | 'separator'
  | 'classification'
  | 'signal'
  | 'crowd'
  | 'botMode'
  | 'biorhythm'
  | 'training'
  | 'schedule'
  | 'nutrition'
  | 'secondary'
  | 'weekHeader'
  | 'weekDay'
  | 'text';

export interface ReportBlock {
  readonly kind: BlockKind;
  readonly lines: readonly string[];
}

/** Ordered text blocks; rendered as Telegram Markdown. */
export interface ReportDocument {
  readonly blocks: readonly ReportBlock[];
}

export type DetailLevel = 'brief' | 'full';

export function block(kind: BlockKind, ...lines: string[]): ReportBlock {
  return { kind, lines };
}

export const SEPARATOR: ReportBlock = block('separator', '');

export function renderDocument(document: ReportDocument): string {
  return document.blocks.flatMap((b) => b.lines).join('\n');
}

/** Escape the characters legacy Telegram Markdown treats as entity markers. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

/**
 * Bold span for legacy Telegram Markdown. Escapes are not allowed inside an
 * entity, so the only marker that matters there, `*`, is dropped.
 */
export function bold(text: string): string {
  return `*${text.replace(/\*/g, '')}*`;
}
