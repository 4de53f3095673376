import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  anyHeading,
  exact,
  keyword,
  type SectionRule,
  type NormalizationPolicy,
} from './NormalizationPolicy.js';

/**
 * Buildings whose effects reach every city in range, listed per district on one section
 */
const regionalEffectsRule: SectionRule = {
  name: 'regional-effects',
  match: [keyword('regional'), exact('Buildings with regional effects[]')],
  layout: {
    type: 'grouped',
    marker: '[]',
    groupNames: ['Industrial Zone', 'Entertainment Complex', 'Water Park', 'Holy Site'],
    overviewLabel: 'Regional Effects Overview',
    groupLabelPrefix: 'Regional Effects - ',
  },
  split: { whenWordsExceed: 300, maxWords: 300 },
  useSystemTitle: true,
  sourceTag: 'regional_effects',
};

/**
 * Building pages, plus the general "Building" mechanics page
 */
export const buildingsPolicy: NormalizationPolicy = {
  name: 'buildings',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  provenance: WIKI_PROVENANCE,
  systemPages: {
    entityNames: ['Building'],
    titles: [{ title: 'Building System' }],
    rules: [
      {
        name: 'system-mechanics',
        match: [exact(INTRODUCTION_HEADING, 'Requirements[]', 'Effects[]')],
        layout: { type: 'classified' },
        sourceTag: 'game_mechanics',
      },
      regionalEffectsRule,
      {
        name: 'system-other',
        match: [anyHeading],
        layout: { type: 'classified' },
      },
    ],
  },
  rules: [
    regionalEffectsRule,
    {
      name: 'building-section',
      match: [anyHeading],
      layout: { type: 'classified' },
      includeMetadata: true,
    },
  ],
};
