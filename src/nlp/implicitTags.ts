import { readFileSync } from 'node:fs';
import { z } from 'zod';

// data/ sits two levels up from both src/nlp and dist/nlp
const TABLE_URL = new URL('../../data/quick-add-tags.json', import.meta.url);

const TagTableSchema = z.object({
  categories: z.record(z.array(z.string().min(1))),
  timePhrases: z.record(z.string().min(1)),
});

interface TagRules {
  categories: Array<[tag: string, words: Set<string>]>;
  timePhrases: Array<[tag: string, re: RegExp]>;
}

let rules: TagRules | undefined;

function loadRules(): TagRules {
  if (rules) return rules;
  const table = TagTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, 'utf8')));
  rules = {
    categories: Object.entries(table.categories).map(([tag, list]): [string, Set<string>] => [tag, new Set(list)]),
    timePhrases: Object.entries(table.timePhrases).map(([tag, phrase]): [string, RegExp] => [
      tag,
      new RegExp(`\\b${phrase.trim().split(/\s+/).join('\\s+')}\\b`, 'i'),
    ]),
  };
  return rules;
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

/**
 * Category tags for whole words found in the text ("Buy milk" -> shopping),
 * then time tags ("tomorrow morning" -> tomorrow, morning). Table order.
 */
export function implicitTags(text: string): string[] {
  const { categories, timePhrases } = loadRules();
  const found = words(text);
  const tags: string[] = [];
  for (const [tag, keywords] of categories) {
    for (const w of keywords) {
      if (found.has(w)) {
        tags.push(tag);
        break;
      }
    }
  }
  for (const [tag, re] of timePhrases) {
    if (re.test(text)) tags.push(tag);
  }
  return tags;
}
