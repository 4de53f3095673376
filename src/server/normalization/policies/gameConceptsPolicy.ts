import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  anyHeading,
  exact,
  fixedLabel,
  keyword,
  type NormalizationPolicy,
} from './NormalizationPolicy.js';

/**
 * Game concept pages explain one mechanic each; every chunk is tagged game_mechanics
 */
export const gameConceptsPolicy: NormalizationPolicy = {
  name: 'game_concepts',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  provenance: WIKI_PROVENANCE,
  rules: [
    {
      name: 'overview',
      match: [exact(INTRODUCTION_HEADING)],
      label: fixedLabel('Overview'),
      layout: { type: 'classified' },
      sourceTag: 'game_mechanics',
    },
    {
      name: 'core-mechanic',
      match: [keyword('what are', 'what is', 'mechanics', 'how it works', 'how to')],
      layout: { type: 'classified' },
      split: { whenWordsExceed: 300, maxWords: 300 },
      sourceTag: 'game_mechanics',
    },
    {
      name: 'affected-elements',
      match: [keyword('affected by', 'elements')],
      layout: { type: 'classified' },
      sourceTag: 'game_mechanics',
    },
    {
      name: 'sub-mechanic',
      match: [anyHeading],
      layout: { type: 'classified' },
      split: { whenWordsExceed: 300, maxWords: 300 },
      sourceTag: 'game_mechanics',
    },
  ],
};
