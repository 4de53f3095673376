import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  anyHeading,
  exact,
  fixedLabel,
  prefixedLabel,
  type NormalizationPolicy,
} from './NormalizationPolicy.js';

/**
 * Leader pages: abilities and agenda, strategy, dialogue, history, trivia
 */
export const leadersPolicy: NormalizationPolicy = {
  name: 'leaders',
  titleStrategy: 'entity',
  entityPattern: EDITION_TAG_PATTERN,
  skipEntities: ['Leaders'],
  provenance: WIKI_PROVENANCE,
  rules: [
    {
      // The first intro item is the structured ability/agenda block, kept as a fact however long
      name: 'overview',
      match: [exact(INTRODUCTION_HEADING)],
      label: fixedLabel('Overview'),
      layout: { type: 'classified', firstItemAsFact: true },
      includeMetadata: true,
    },
    {
      name: 'in-game',
      match: [exact('In-Game[]')],
      label: fixedLabel('Abilities and Agenda Details'),
      layout: { type: 'main' },
      sourceTag: 'strategy',
    },
    {
      name: 'detailed-approach',
      match: [exact('Detailed Approach[]')],
      label: fixedLabel('Strategy and Approach'),
      layout: { type: 'main' },
      sourceTag: 'strategy',
    },
    {
      name: 'intro-flavor',
      match: [exact('Intro[]')],
      label: fixedLabel('Leader Introduction'),
      layout: { type: 'main' },
      sourceTag: 'flavor_text',
    },
    {
      name: 'dialogue',
      match: [exact('Lines[]', 'Unvoiced[]', 'Voiced[]')],
      label: prefixedLabel('Dialogue - '),
      layout: { type: 'facts' },
      sourceTag: 'dialogue',
    },
    {
      name: 'civilopedia',
      match: [exact('Civilopedia entry[]')],
      label: fixedLabel('Historical Background'),
      layout: { type: 'main' },
      split: { whenWordsExceed: 400, maxWords: 350 },
      sourceTag: 'history',
    },
    {
      name: 'trivia',
      match: [exact('Trivia[]')],
      label: fixedLabel('Trivia'),
      layout: { type: 'facts' },
      sourceTag: 'trivia',
    },
    {
      name: 'external-links',
      match: [exact('External links[]')],
      label: fixedLabel('External Links'),
      layout: { type: 'facts' },
      sourceTag: 'reference',
    },
    {
      name: 'other',
      match: [anyHeading],
      layout: { type: 'classified' },
    },
  ],
};
