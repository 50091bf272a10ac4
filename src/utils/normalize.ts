/**
 * URL encoding for search queries
 * Overseerr rejects some characters that encodeURIComponent leaves alone
 */
export function encodeSearchQuery(query: string): string {
  let encoded = encodeURIComponent(query);

  const additionalEncoding: Record<string, string> = {
    '!': '%21',  // causes 400 errors
    "'": '%27',  // causes 400 errors
    '(': '%28',
    ')': '%29',
    '*': '%2A',
  };

  for (const [char, encodedChar] of Object.entries(additionalEncoding)) {
    encoded = encoded.split(char).join(encodedChar);
  }

  return encoded;
}

/**
 * Checks if a spoken title names a season, e.g. "Severance Season 2" or "Andor S2"
 */
export function mentionsSeason(title: string): boolean {
  const patterns = [
    /\bSeason\s+\d+/i,
    /\bS\s?\d{1,2}\b/,
    /\b\d+(?:st|nd|rd|th)\s+Season/i,
    /\bFinal\s+Season/i,
  ];

  return patterns.some(pattern => pattern.test(title));
}

/**
 * Infers the expected media type based on title patterns
 * Returns 'tv' if title contains season indicators, otherwise 'any'
 */
export function inferExpectedMediaType(title: string): 'tv' | 'any' {
  return mentionsSeason(title) ? 'tv' : 'any';
}
