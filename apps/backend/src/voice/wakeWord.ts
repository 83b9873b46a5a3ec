// Wake Word Matcher
// Finds the wake phrase inside a transcript, tolerating small recognition errors
// ("hey asistant", "hey, assistant!") without matching unrelated speech

export interface WakeWordMatch {
    detected: boolean;
    confidence: number;
    /** Text spoken after the wake phrase, empty when none */
    remainder: string;
}

const MIN_FUZZY_TOKEN_LENGTH = 4;
const FUZZY_PENALTY = 0.1;

/**
 * Lowercase, drop punctuation, collapse whitespace
 */
export function normalizeTranscript(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s']/gu, ' ')
        .replace(/'/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Levenshtein distance between two short strings
 */
export function editDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current.push(Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            ));
        }
        previous = current;
    }
    return previous[b.length];
}

/**
 * Edits between a heard token and the expected token, or null when too far apart
 */
function tokenEdits(heard: string, expected: string): number | null {
    if (heard === expected) return 0;
    if (expected.length < MIN_FUZZY_TOKEN_LENGTH) return null;
    const distance = editDistance(heard, expected);
    return distance <= 1 ? distance : null;
}

export class WakeWordMatcher {
    private readonly phraseTokens: string[];

    constructor(readonly wakeWord: string) {
        this.phraseTokens = normalizeTranscript(wakeWord).split(' ').filter((t) => t.length > 0);
        if (this.phraseTokens.length === 0) {
            throw new Error('Wake word must contain at least one word');
        }
    }

    match(transcript: string): WakeWordMatch {
        const tokens = normalizeTranscript(transcript).split(' ').filter((t) => t.length > 0);
        const phraseLength = this.phraseTokens.length;

        for (let start = 0; start + phraseLength <= tokens.length; start++) {
            let edits = 0;
            let matched = true;

            for (let k = 0; k < phraseLength; k++) {
                const result = tokenEdits(tokens[start + k], this.phraseTokens[k]);
                if (result === null) {
                    matched = false;
                    break;
                }
                edits += result;
            }

            if (matched) {
                return {
                    detected: true,
                    confidence: Math.max(0, 1 - edits * FUZZY_PENALTY),
                    remainder: tokens.slice(start + phraseLength).join(' '),
                };
            }
        }

        return { detected: false, confidence: 0, remainder: '' };
    }
}
