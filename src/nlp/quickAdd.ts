/**
 * Parses a one-line task such as "Submit report tomorrow #work urgent".
 * Markers are stripped from the text; what remains is the title.
 */
import type { Priority } from '../model.js';
import { MAX_TAGS, normalizeTags } from '../tasks/schemas.js';
import { findDuePhrase } from './dueDates.js';
import { implicitTags } from './implicitTags.js';

export interface QuickAddResult {
  title: string;
  priority?: Priority;
  tags: string[];
  /** yyyy-MM-dd */
  dueDate?: string;
}

// #tag, hyphens allowed (#follow-up)
const TAG_RE = /(?:^|\s)#([\w-]+)/g;

// first group that matches wins
const PRIORITY_WORDS: ReadonlyArray<readonly [Priority, RegExp]> = [
  ['high', /\b(?:urgent|asap|critical|important|high)\b(?:\s+priority)?/i],
  ['medium', /\b(?:medium|normal)\b(?:\s+priority)?/i],
  ['low', /\b(?:low|minor|optional|someday)\b(?:\s+priority)?/i],
];

function cut(text: string, index: number, length: number): string {
  return `${text.slice(0, index)} ${text.slice(index + length)}`;
}

export function parseQuickAdd(text: string, now: Date = new Date()): QuickAddResult {
  // explicit #tags first, then keyword and time tags
  const explicit = [...text.matchAll(TAG_RE)].map((m) => m[1] ?? '');
  const tags = normalizeTags([...explicit, ...implicitTags(text)]).slice(0, MAX_TAGS);
  let rest = text.replace(TAG_RE, ' ');

  let priority: Priority | undefined;
  for (const [level, re] of PRIORITY_WORDS) {
    const m = re.exec(rest);
    if (!m) continue;
    priority = level;
    rest = cut(rest, m.index, m[0].length);
    break;
  }

  const due = findDuePhrase(rest, now);
  if (due) rest = cut(rest, due.index, due.phrase.length);

  const title = rest
    .replace(/\s+/g, ' ')
    .replace(/^[\s,;:-]+|[\s,;:-]+$/g, '');

  return { title, priority, tags, dueDate: due?.date };
}
