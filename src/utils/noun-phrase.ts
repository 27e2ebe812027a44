/**
 * Words that describe a document's structure rather than a concept.
 * "Introduction to RAG" names RAG; "LLM Twin Overview" names LLM Twin.
 */
const STRUCTURAL_PREFIX = /^(?:an?\s+|the\s+)?(?:introduction|intro|overview|guide|tutorial|primer)\s+(?:to|of|on|for)\s+/i;

const STRUCTURAL_WORDS = [
  'overview',
  'introduction',
  'mastering',
  'guide',
  'tutorial',
  'complete',
  'deep dive',
  'basics',
  'fundamentals',
  'advanced'
];

const STRUCTURAL_WORD_PATTERN = new RegExp(`\\b(?:${STRUCTURAL_WORDS.map(w => w.replace(' ', '\\s+')).join('|')})\\b`, 'gi');

/**
 * Deterministic noun-phrase summary used when the oracle supplies none
 */
export function summarizeNounPhrase(text: string): string {
  const trimmed = text.trim().replace(/\s+/g, ' ');
  const stripped = trimmed
    .replace(STRUCTURAL_PREFIX, '')
    .replace(STRUCTURAL_WORD_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s:\-–—,.]+|[\s:\-–—,.]+$/g, '')
    .trim();

  return stripped.length > 0 ? stripped : trimmed;
}
