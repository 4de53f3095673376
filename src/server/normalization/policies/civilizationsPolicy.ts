import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  anyHeading,
  exact,
  fixedLabel,
  keyword,
  prefixedLabel,
  type NormalizationPolicy,
} from './NormalizationPolicy.js';

/**
 * Civilization pages: overview, leader abilities, strategy, unique components
 */
export const civilizationsPolicy: NormalizationPolicy = {
  name: 'civilizations',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  skipEntities: ['Civilizations'],
  provenance: WIKI_PROVENANCE,
  rules: [
    {
      name: 'overview',
      match: [exact(INTRODUCTION_HEADING)],
      label: fixedLabel('Overview'),
      layout: { type: 'classified' },
      includeMetadata: true,
    },
    {
      name: 'leader-ability',
      match: [keyword('roosevelt', 'lincoln', 'corollary', 'emancipation', 'antiquities')],
      layout: { type: 'main' },
      split: { whenWordsExceed: 300, maxWords: 300 },
      sourceTag: 'leader_ability',
    },
    {
      name: 'strategy',
      match: [keyword('strategy'), exact('Vanilla version[]', 'Rise and Fall & Gathering Storm[]')],
      label: prefixedLabel('Strategy - '),
      layout: { type: 'main' },
      split: { whenWordsExceed: 300, maxWords: 300 },
      sourceTag: 'strategy',
    },
    {
      name: 'unique-component',
      match: [
        exact('P-51 Mustang[]', 'Film Studio[]', 'Rough Rider[]'),
        keyword('unit[]', 'building[]', 'infrastructure[]'),
      ],
      label: prefixedLabel('Unique Component - '),
      layout: { type: 'classified', factThreshold: 150 },
      sourceTag: 'unique_component',
    },
    {
      name: 'gameplay-advice',
      match: [keyword('victory', 'counter')],
      layout: { type: 'main' },
      sourceTag: 'gameplay_advice',
    },
    {
      name: 'other',
      match: [anyHeading],
      layout: { type: 'classified' },
    },
  ],
};
