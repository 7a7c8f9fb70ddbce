/**
 * Shared-keyword explanation for evidence matches
 */

import { KEYWORD_STOP_WORDS } from "@/constants";
import { lowercaseWords } from "@/utils";

/**
 * Words present in both texts (case-insensitive), minus stop words,
 * sorted alphabetically.
 *
 * @example
 * findCommonKeywords("5+ years Python experience", "Led Python team for 6 years")
 * // ["python", "years"]
 */
export function findCommonKeywords(text1: string, text2: string): string[] {
  const words2 = new Set(lowercaseWords(text2));
  const common = new Set<string>();
  for (const word of lowercaseWords(text1)) {
    if (words2.has(word) && !KEYWORD_STOP_WORDS.has(word)) {
      common.add(word);
    }
  }
  return [...common].sort();
}
