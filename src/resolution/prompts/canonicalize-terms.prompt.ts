import { VocabularyCategory } from '../../types/game.types';

const CATEGORY_LABELS: Record<VocabularyCategory, string> = {
  genres: 'video game genres',
  platforms: 'gaming platforms',
  tags: 'video game tags',
};

/**
 * 자유 입력 용어를 허용된 이름 중 하나로 대응시키는 프롬프트
 */
export function buildCanonicalizePrompt(
  category: VocabularyCategory,
  terms: readonly string[],
  allowedNames: readonly string[],
): string {
  return [
    `You map user-provided ${CATEGORY_LABELS[category]} to an official list.`,
    `Allowed names: ${JSON.stringify(allowedNames)}`,
    `Terms: ${JSON.stringify(terms)}`,
    'For every term, choose the single allowed name with the same meaning, or null if none fits.',
    'Copy allowed names exactly. Reply with one JSON object whose keys are the terms, and nothing else.',
    'Example: {"role playing": "RPG", "sandboxy": null}',
  ].join('\n');
}
