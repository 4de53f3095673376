import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  anyHeading,
  exact,
  fixedLabel,
  type NormalizationPolicy,
} from './NormalizationPolicy.js';

/**
 * District pages, plus the general "District" mechanics pages
 */
export const districtsPolicy: NormalizationPolicy = {
  name: 'districts',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  provenance: WIKI_PROVENANCE,
  systemPages: {
    entityNames: ['District', 'List of districts in Civ6'],
    titles: [{ title: 'District System' }],
    rules: [
      {
        name: 'system-mechanics',
        match: [
          exact(
            INTRODUCTION_HEADING,
            'What is a district?[]',
            'What does a district do?[]',
            'Building a district[]',
            'Basic requirements[]',
            'Suitable locations[]'
          ),
        ],
        layout: { type: 'classified' },
        split: { whenWordsExceed: 300, maxWords: 300 },
        sourceTag: 'game_mechanics',
      },
      {
        name: 'system-other',
        match: [anyHeading],
        layout: { type: 'classified' },
      },
    ],
  },
  rules: [
    {
      name: 'overview',
      match: [exact(INTRODUCTION_HEADING)],
      label: fixedLabel('Overview'),
      layout: { type: 'classified' },
      includeMetadata: true,
    },
    {
      name: 'buildings-and-projects',
      match: [exact('Buildings[]', 'Projects[]')],
      layout: { type: 'facts' },
    },
    {
      name: 'strategy',
      match: [exact('Strategy[]')],
      label: fixedLabel('Strategy'),
      layout: { type: 'main' },
      split: { whenWordsExceed: 300, maxWords: 300 },
      sourceTag: 'strategy',
    },
    {
      name: 'civilopedia',
      match: [exact('Civilopedia entry[]')],
      label: fixedLabel('Historical Background'),
      layout: { type: 'main' },
      sourceTag: 'history',
    },
    {
      name: 'other',
      match: [anyHeading],
      layout: { type: 'classified' },
    },
  ],
};
