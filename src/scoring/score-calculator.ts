import { isFormatDirective } from "../scanner/format-directives.js";
import { isWordToken } from "../scanner/tokenizer.js";
import type { MessageQuery, Token } from "../scanner/types.js";
import { SEPARATOR_WEIGHT, WORD_WEIGHT } from "./weights.js";

/**
 * Score a candidate literal against the message.
 *
 * Only tokens that also occur in the message count, and they must occur in
 * the message in the same relative order. Each one is matched greedily to
 * its earliest occurrence after the previous match; a token that cannot be
 * placed rejects the whole candidate with a score of 0.
 */
export function calculateScore(
  query: Pick<MessageQuery, "tokens" | "tokenSet">,
  candidateTokens: readonly Token[],
): number {
  const shared = candidateTokens.filter(
    (token) => query.tokenSet.has(token) && !isFormatDirective(token),
  );
  if (shared.length === 0) {
    return 0;
  }

  if (!isOrderedSubsequence(shared, query.tokens)) {
    return 0;
  }

  let score = 0;
  for (const token of shared) {
    score += tokenWeight(token);
  }
  return score;
}

export function isOrderedSubsequence(
  tokens: readonly Token[],
  within: readonly Token[],
): boolean {
  let previous = -1;
  for (const token of tokens) {
    const current = within.indexOf(token, previous + 1);
    if (current === -1) {
      return false;
    }
    previous = current;
  }
  return true;
}

/** Code points in the token times its class weight. */
export function tokenWeight(token: Token): number {
  const length = [...token].length;
  return length * (isWordToken(token) ? WORD_WEIGHT : SEPARATOR_WEIGHT);
}
