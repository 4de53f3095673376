/**
 * NormalizationPolicy - Declarative rules for turning wiki sections into chunks
 *
 * One policy per content category. The generic PolicyNormalizer interprets it; the
 * policy files hold only data. Heading literals and entity names in the rule tables are
 * editorial categorization of the wiki content and are meant to be edited by hand.
 */

import type { IntermediateDocument } from '../../contracts/types.js';

/**
 * Heading of the first, unlabeled block of a wiki page
 */
export const INTRODUCTION_HEADING = 'Introduction';

/**
 * Matches a section heading
 * - exact: raw heading (marker included) equals one of the literals
 * - keyword: lower-cased raw heading contains one of the keywords
 * - any: always matches (fallback rules)
 */
export type HeadingMatcher =
  | { type: 'exact'; headings: readonly string[] }
  | { type: 'keyword'; keywords: readonly string[] }
  | { type: 'any' };

/**
 * Text of the Section line
 * - heading: the cleaned heading
 * - fixed: a constant label
 * - prefixed: prefix followed by the cleaned heading
 */
export type SectionLabel =
  | { type: 'heading' }
  | { type: 'fixed'; label: string }
  | { type: 'prefixed'; prefix: string };

/**
 * How the items of a section are laid out when it is not split
 * - classified: short items become Key Facts, long ones Main Content
 * - main: every item is Main Content
 * - facts: every non-blank item is a Key Facts bullet
 * - grouped: items marked as sub-headings open groups (see GroupedLayout)
 */
export type SectionLayout =
  | { type: 'classified'; factThreshold?: number; firstItemAsFact?: boolean }
  | { type: 'main' }
  | { type: 'facts' }
  | GroupedLayout;

/**
 * Sub-headings flattened into the item list of one section. An item ending with
 * `marker` that names one of `groupNames` opens a group; items before the first
 * group form the overview.
 */
export interface GroupedLayout {
  type: 'grouped';
  marker: string;
  groupNames: readonly string[];
  overviewLabel: string;
  groupLabelPrefix: string;
}

/**
 * Split the section with the word-bounded splitter when its items hold more than
 * `whenWordsExceed` words; parts hold at most `maxWords` words.
 */
export interface SplitRule {
  whenWordsExceed: number;
  maxWords: number;
}

export interface SectionRule {
  name: string;
  /** The rule applies when any matcher matches */
  match: readonly HeadingMatcher[];
  label?: SectionLabel;
  layout: SectionLayout;
  split?: SplitRule;
  /** Emit page metadata as Key Facts when the section is the introduction */
  includeMetadata?: boolean;
  /** Use the policy's system title even on entity pages */
  useSystemTitle?: boolean;
  /** Free-text tag appended to the Source line */
  sourceTag?: string;
}

export interface SystemTitle {
  /** Case-insensitive keyword the entity name must contain; omitted = default title */
  keyword?: string;
  title: string;
}

/**
 * General-mechanics pages ("District", "Wonder") share a system title
 */
export interface SystemPagePolicy {
  entityNames: readonly string[];
  titles: readonly SystemTitle[];
  rules: readonly SectionRule[];
}

export type ProvenanceField = keyof Pick<
  IntermediateDocument,
  'source' | 'category' | 'page_name' | 'bbg_version'
>;

export interface NormalizationPolicy {
  name: string;
  /**
   * entity: name derived from the title with entityPattern (first capture group)
   * document: the title as-is
   */
  titleStrategy: 'entity' | 'document';
  entityPattern?: RegExp;
  /** Category index pages that carry no per-entity content */
  skipEntities?: readonly string[];
  systemPages?: SystemPagePolicy;
  /** Rules for entity pages (or every page when there are no system pages) */
  rules: readonly SectionRule[];
  provenance: readonly ProvenanceField[];
}

/**
 * Game-edition suffix on official wiki titles: "Acropolis (Civ6)"
 */
export const EDITION_TAG_PATTERN = /^(.+?)\s*\(Civ6\)/;

export const WIKI_PROVENANCE: readonly ProvenanceField[] = ['source', 'category'];

export const DEFAULT_FALLBACK_RULE: SectionRule = {
  name: 'fallback',
  match: [{ type: 'any' }],
  layout: { type: 'classified' },
};

/**
 * Shorthands for the rule tables
 */
export const exact = (...headings: string[]): HeadingMatcher => ({ type: 'exact', headings });
export const keyword = (...keywords: string[]): HeadingMatcher => ({ type: 'keyword', keywords });
export const anyHeading: HeadingMatcher = { type: 'any' };
export const fixedLabel = (label: string): SectionLabel => ({ type: 'fixed', label });
export const prefixedLabel = (prefix: string): SectionLabel => ({ type: 'prefixed', prefix });
