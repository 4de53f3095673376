import { anyHeading, type NormalizationPolicy } from './NormalizationPolicy.js';

/**
 * Balance-mod wiki pages list one entry (city-state, belief, resolution, ...) per
 * section under the page title; every section is classified into facts and content.
 */
function modWikiPolicy(name: string): NormalizationPolicy {
  return {
    name,
    titleStrategy: 'document',
    provenance: ['source', 'category', 'page_name', 'bbg_version'],
    rules: [
      {
        name: 'entry',
        match: [anyHeading],
        layout: { type: 'classified' },
      },
    ],
  };
}

export const cityStatesPolicy = modWikiPolicy('city_states');
export const religionsPolicy = modWikiPolicy('religions');
export const worldCongressPolicy = modWikiPolicy('world_congress');
export const miscellaneousPolicy = modWikiPolicy('miscellaneous');
export const naturalWondersPolicy = modWikiPolicy('natural_wonders');
