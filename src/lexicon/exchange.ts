/**
 * ECDICT exchange fields list related word forms as slash separated
 * `code:form` pairs, e.g. `p:ran/d:ran/i:running/3:runs/s:runs/0:run`.
 *
 * Codes: p past tense, d past participle, i present participle,
 * 3 third person singular, r comparative, t superlative, s plural,
 * 0 lemma, 1 how this word derives from its lemma.
 */
export const parseExchange = (exchange: string): Map<string, string> => {
  const forms = new Map<string, string>();
  for (const pair of exchange.split('/')) {
    const separator = pair.indexOf(':');
    if (separator <= 0) continue;

    const code = pair.slice(0, separator).trim();
    const form = pair.slice(separator + 1).trim();
    if (code && form && !forms.has(code)) {
      forms.set(code, form);
    }
  }
  return forms;
};

const LEMMA_PATTERN = /[012]:(\w+)/;

/**
 * First form tagged 0, 1 or 2, in the order they appear in the field.
 */
export const extractLemma = (exchange: string): string | undefined => {
  const match = LEMMA_PATTERN.exec(exchange);
  return match ? match[1] : undefined;
};
