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
 * World and natural wonder pages, plus the general wonder mechanics pages
 */
export const wondersPolicy: NormalizationPolicy = {
  name: 'wonders',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  provenance: WIKI_PROVENANCE,
  systemPages: {
    entityNames: ['Wonder', 'Natural wonder', 'List of wonders in Civ6', 'Natural wonders'],
    titles: [
      { keyword: 'natural', title: 'Natural Wonder System' },
      { title: 'Wonder System' },
    ],
    rules: [
      {
        name: 'system-mechanics',
        match: [
          exact(
            INTRODUCTION_HEADING,
            'Finding natural wonders[]',
            'Bonuses and effects[]',
            'Building a wonder[]',
            'Natural wonder picker[]'
          ),
        ],
        layout: { type: 'classified' },
        split: { whenWordsExceed: 300, maxWords: 300 },
        sourceTag: 'game_mechanics',
      },
      {
        name: 'system-strategy',
        match: [exact('Strategy[]')],
        label: fixedLabel('Strategy'),
        layout: { type: 'main' },
        split: { whenWordsExceed: 300, maxWords: 300 },
        sourceTag: 'strategy',
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
      name: 'strategy',
      match: [exact('Strategy[]')],
      label: fixedLabel('Strategy'),
      layout: { type: 'main' },
      sourceTag: 'strategy',
    },
    {
      name: 'civilopedia',
      match: [exact('Civilopedia entry[]')],
      label: fixedLabel('Historical Background'),
      layout: { type: 'main' },
      split: { whenWordsExceed: 350, maxWords: 350 },
      sourceTag: 'history',
    },
    {
      name: 'other',
      match: [anyHeading],
      layout: { type: 'classified' },
    },
  ],
};
