const COMMON_WORDS = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "is",
  "are",
  "was",
  "were",
]);

const OVERLAP_THRESHOLD = 0.6;

export interface NearDuplicateResult {
  isDuplicate: boolean;
  reason?: "word-overlap" | "repeated-phrase";
  overlap?: number;
  phrase?: string;
  matchedText?: string;
}

export function meaningfulWords(text: string): Set<string> {
  const words = text.toLowerCase().match(/\w+/g) || [];
  return new Set(words.filter((word) => !COMMON_WORDS.has(word)));
}

export function threeWordPhrases(text: string): Set<string> {
  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  const phrases = new Set<string>();
  for (let i = 0; i + 2 < words.length; i += 1) {
    phrases.add(`${words[i]} ${words[i + 1]} ${words[i + 2]}`);
  }
  return phrases;
}

/**
 * Overlap is measured against the candidate's own vocabulary (|new ∩ old| / |new|),
 * so padding a recent post with a few words still counts as a repeat.
 */
export function findNearDuplicate(candidate: string, history: readonly string[]): NearDuplicateResult {
  if (history.length === 0) {
    return { isDuplicate: false };
  }

  const candidateWords = meaningfulWords(candidate);
  const candidatePhrases = threeWordPhrases(candidate);

  for (const previous of history) {
    const previousWords = meaningfulWords(previous);
    if (candidateWords.size > 0 && previousWords.size > 0) {
      let shared = 0;
      for (const word of candidateWords) {
        if (previousWords.has(word)) shared += 1;
      }
      const overlap = shared / candidateWords.size;
      if (overlap > OVERLAP_THRESHOLD) {
        return {
          isDuplicate: true,
          reason: "word-overlap",
          overlap: Math.round(overlap * 100) / 100,
          matchedText: previous,
        };
      }
    }

    for (const phrase of threeWordPhrases(previous)) {
      if (candidatePhrases.has(phrase)) {
        return { isDuplicate: true, reason: "repeated-phrase", phrase, matchedText: previous };
      }
    }
  }

  return { isDuplicate: false };
}
