import type { RevealToken } from "unfurl-shared";
import { FENCE, isFenceLine } from "../content/predicates";

const SPLITTABLE_PUNCTUATION = new Set([".", "!", "?", ",", ";", ":"]);

/**
 * Push a word, splitting trailing punctuation into its own token when the
 * word is longer than two characters.
 */
function pushWord(tokens: RevealToken[], lead: string, word: string): void {
  const last = word.charAt(word.length - 1);
  if (word.length > 2 && SPLITTABLE_PUNCTUATION.has(last)) {
    pushToken(tokens, lead + word.slice(0, -1));
    pushToken(tokens, last);
    return;
  }
  pushToken(tokens, lead + word);
}

function pushToken(tokens: RevealToken[], text: string): void {
  if (text !== "") tokens.push({ text });
}

/**
 * Word tokens for one line: the first word takes `firstLead`, the rest a space.
 */
function tokenizeWords(tokens: RevealToken[], line: string, firstLead: string): void {
  line.split(" ").forEach((word, index) => {
    pushWord(tokens, index === 0 ? firstLead : " ", word);
  });
}

/**
 * Split message content into reveal tokens.
 *
 * Plain text reveals word by word. Text containing a code fence reveals line
 * by line inside fences and word by word outside them. The split is lossless:
 * joining the token texts gives back `text` exactly.
 *
 * @example
 * ```typescript
 * tokenize('Hello, world!').map((t) => t.text);
 * // ['Hello', ',', ' world', '!']
 * ```
 */
export function tokenize(text: string): RevealToken[] {
  const tokens: RevealToken[] = [];

  if (!text.includes(FENCE)) {
    tokenizeWords(tokens, text, "");
    return tokens;
  }

  let inFence = false;
  text.split("\n").forEach((line, index) => {
    const lead = index === 0 ? "" : "\n";
    if (isFenceLine(line)) {
      inFence = !inFence;
      pushToken(tokens, lead + line);
    } else if (inFence) {
      pushToken(tokens, lead + line);
    } else {
      tokenizeWords(tokens, line, lead);
    }
  });
  return tokens;
}

/**
 * Concatenate token texts.
 */
export function joinTokens(tokens: readonly RevealToken[]): string {
  return tokens.map((token) => token.text).join("");
}
