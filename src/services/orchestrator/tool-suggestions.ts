// Keyword hints pointing the model at tools that fit the user's request

export interface ToolSuggestion {
  tool: string;
  reason: string;
}

interface SuggestionRule {
  keywords: string[];
  /** Matched against the raw request instead of words. */
  pattern?: RegExp;
  tools: Record<string, string>;
}

const RULES: SuggestionRule[] = [
  {
    keywords: ['calculate', 'add', 'subtract', 'multiply', 'divide', 'square root', 'sqrt', 'math', 'percent'],
    pattern: /\d\s*[-+*/^=%]\s*\d/,
    tools: { calculator: 'This request involves mathematical calculations' },
  },
  {
    keywords: ['fetch', 'get data', 'api', 'url', 'website', 'http', 'download', 'web page', 'webpage'],
    tools: {
      http_get: 'This request involves fetching web data',
      web_scraper: 'This request involves web content extraction',
    },
  },
  {
    keywords: ['post', 'submit', 'send data', 'webhook'],
    tools: { http_post: 'This request involves sending data to a web service' },
  },
  {
    keywords: ['count words', 'extract', 'uppercase', 'lowercase', 'process text', 'analyze text', 'reverse'],
    tools: { text_processor: 'This request involves text manipulation' },
  },
  {
    keywords: ['json', 'parse', 'format json', 'validate json'],
    tools: { json_processor: 'This request involves JSON processing' },
  },
  {
    keywords: ['remember', 'recall', 'forget', 'my preference', 'last time', 'you know about me'],
    tools: { memory: 'This request involves remembering information across sessions' },
  },
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const KEYWORD_PATTERNS = new Map(
  RULES.flatMap(rule => rule.keywords).map(keyword => [keyword, new RegExp(`\\b${escapeRegExp(keyword)}\\b`)])
);

function hits(rule: SuggestionRule, text: string, raw: string): number {
  let count = rule.keywords.filter(keyword => KEYWORD_PATTERNS.get(keyword)?.test(text)).length;
  if (rule.pattern?.test(raw)) count++;
  return count;
}

/**
 * Tools from `availableTools` whose keywords appear in the request, most
 * keyword hits first. Tools that are not available are never suggested.
 */
export function suggestTools(request: string, availableTools: Iterable<string>): ToolSuggestion[] {
  const available = new Set(availableTools);
  const text = request.toLowerCase();

  const scored: { suggestion: ToolSuggestion; hits: number }[] = [];
  for (const rule of RULES) {
    const ruleHits = hits(rule, text, request);
    if (ruleHits === 0) continue;

    for (const [tool, reason] of Object.entries(rule.tools)) {
      if (available.has(tool)) {
        scored.push({ suggestion: { tool, reason }, hits: ruleHits });
      }
    }
  }

  scored.sort((a, b) => b.hits - a.hits);
  return scored.map(({ suggestion }) => suggestion);
}
