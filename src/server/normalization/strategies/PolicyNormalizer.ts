/**
 * PolicyNormalizer - Generic normalizer driven by a NormalizationPolicy
 *
 * Every wiki category shares this routine; what differs per category lives in the
 * rule tables under ../policies. For each non-empty section the first matching rule
 * decides the Title and Section labels, the layout of the items, whether long sections
 * are split into parts, and the tag appended to the Source line.
 */

import type { Chunk, IntermediateDocument, Section } from '../../contracts/types.js';
import { classifyContent, DEFAULT_FACT_THRESHOLD } from '../../chunking/FactClassifier.js';
import { splitByWordCount } from '../../chunking/WordBoundedSplitter.js';
import { cleanHeading, countWordsInItems } from '../../utils/textUtils.js';
import { formatChunk, partLabel, type ChunkParts } from '../ChunkFormatter.js';
import {
  DEFAULT_FALLBACK_RULE,
  INTRODUCTION_HEADING,
  type GroupedLayout,
  type HeadingMatcher,
  type NormalizationPolicy,
  type SectionLabel,
  type SectionRule,
} from '../policies/NormalizationPolicy.js';
import type { DocumentNormalizer } from './DocumentNormalizer.js';

export interface PolicyNormalizerOptions {
  /** Fact threshold of classified layouts that do not set their own */
  factThreshold?: number;
}

/**
 * Bare entity name from a decorated title; the title itself when the pattern does not match
 */
export function extractEntityName(title: string, pattern?: RegExp): string {
  if (!pattern) return title;
  const match = pattern.exec(title);
  return match?.[1] ?? title;
}

export function matchesHeading(matcher: HeadingMatcher, heading: string): boolean {
  switch (matcher.type) {
    case 'exact':
      return matcher.headings.includes(heading);
    case 'keyword': {
      const lowered = heading.toLowerCase();
      return matcher.keywords.some(keyword => lowered.includes(keyword.toLowerCase()));
    }
    case 'any':
      return true;
  }
}

/**
 * First rule with a matcher that accepts the heading
 */
export function selectRule(rules: readonly SectionRule[], heading: string): SectionRule {
  return (
    rules.find(rule => rule.match.some(matcher => matchesHeading(matcher, heading))) ??
    DEFAULT_FALLBACK_RULE
  );
}

function resolveLabel(label: SectionLabel | undefined, heading: string): string {
  if (!label) return cleanHeading(heading);
  switch (label.type) {
    case 'heading':
      return cleanHeading(heading);
    case 'fixed':
      return label.label;
    case 'prefixed':
      return `${label.prefix}${cleanHeading(heading)}`;
  }
}

function trimmedNonBlank(items: readonly string[]): string[] {
  return items.map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Per-section context shared by the layout renderers
 */
interface SectionContext {
  title: string;
  label: string;
  metadataFacts: string[];
  provenance: string[];
}

export class PolicyNormalizer implements DocumentNormalizer {
  private readonly factThreshold: number;

  constructor(
    private readonly policy: NormalizationPolicy,
    options: PolicyNormalizerOptions = {}
  ) {
    this.factThreshold = options.factThreshold ?? DEFAULT_FACT_THRESHOLD;
  }

  getName(): string {
    return this.policy.name;
  }

  normalize(document: IntermediateDocument): Chunk[] {
    const entityName =
      this.policy.titleStrategy === 'entity'
        ? extractEntityName(document.title, this.policy.entityPattern)
        : document.title;

    if (this.policy.skipEntities?.includes(entityName)) {
      return [];
    }

    const systemPages = this.policy.systemPages;
    const isSystemPage = systemPages?.entityNames.includes(entityName) ?? false;
    const rules = isSystemPage && systemPages ? systemPages.rules : this.policy.rules;
    const systemTitle = this.resolveSystemTitle(entityName);

    const chunks: Chunk[] = [];
    for (const section of document.sections) {
      if (section.content.length === 0) continue;

      const rule = selectRule(rules, section.heading);
      const title = (isSystemPage || rule.useSystemTitle) && systemTitle ? systemTitle : entityName;

      chunks.push(...this.normalizeSection(document, section, rule, title));
    }

    return chunks;
  }

  /**
   * Shared title of general-mechanics pages: the first entry whose keyword the entity
   * name contains, else the first entry without a keyword
   */
  private resolveSystemTitle(entityName: string): string | undefined {
    const titles = this.policy.systemPages?.titles ?? [];
    const lowered = entityName.toLowerCase();
    const keyed = titles.find(
      candidate => candidate.keyword !== undefined && lowered.includes(candidate.keyword.toLowerCase())
    );
    return (keyed ?? titles.find(candidate => candidate.keyword === undefined))?.title;
  }

  private normalizeSection(
    document: IntermediateDocument,
    section: Section,
    rule: SectionRule,
    title: string
  ): Chunk[] {
    const context: SectionContext = {
      title,
      label: resolveLabel(rule.label, section.heading),
      metadataFacts:
        rule.includeMetadata && section.heading === INTRODUCTION_HEADING
          ? this.metadataFacts(document)
          : [],
      provenance: this.provenance(document, rule),
    };

    if (rule.layout.type === 'grouped') {
      return this.renderGrouped(section.content, rule, rule.layout, context);
    }

    const split = rule.split;
    if (split && countWordsInItems(section.content) > split.whenWordsExceed) {
      return this.renderParts(section.content, split.maxWords, context.label, context);
    }

    const { keyFacts = [], mainContent } = this.layoutParts(section.content, rule);
    return [
      formatChunk({
        ...this.header(context),
        keyFacts: [...context.metadataFacts, ...keyFacts],
        mainContent,
      }),
    ];
  }

  /**
   * Key Facts / Main Content of an unsplit section
   */
  private layoutParts(items: readonly string[], rule: SectionRule): Pick<ChunkParts, 'keyFacts' | 'mainContent'> {
    const layout = rule.layout;
    switch (layout.type) {
      case 'main':
        return { mainContent: trimmedNonBlank(items) };
      case 'facts':
        return { keyFacts: trimmedNonBlank(items) };
      case 'classified': {
        const threshold = layout.factThreshold ?? this.factThreshold;
        if (layout.firstItemAsFact && items.length > 0) {
          // The leading item is a fact whatever its length
          const rest = classifyContent(items.slice(1), threshold);
          return {
            keyFacts: trimmedNonBlank([items[0], ...rest.facts]),
            mainContent: trimmedNonBlank(rest.mainContent),
          };
        }
        const { facts, mainContent } = classifyContent(items, threshold);
        return { keyFacts: trimmedNonBlank(facts), mainContent: trimmedNonBlank(mainContent) };
      }
      case 'grouped':
        return { mainContent: trimmedNonBlank(items) };
    }
  }

  private header(context: SectionContext): ChunkParts {
    return {
      title: context.title,
      section: context.label,
      provenance: context.provenance,
    };
  }

  /**
   * One Main Content chunk per word-bounded part, labeled "(Part i/N)" when there are several.
   * Page metadata goes on the first part only.
   */
  private renderParts(
    items: readonly string[],
    maxWords: number,
    label: string,
    context: SectionContext
  ): Chunk[] {
    const parts = splitByWordCount(items, { maxWords });
    return parts.map((part, index) =>
      formatChunk({
        ...this.header(context),
        section: partLabel(label, index, parts.length),
        keyFacts: index === 0 ? context.metadataFacts : [],
        mainContent: [part],
      })
    );
  }

  /**
   * Overview chunk(s) for the items before the first group marker, then one Key Facts
   * chunk per non-empty group. A group named twice keeps its first position and the
   * items of its last occurrence.
   */
  private renderGrouped(
    items: readonly string[],
    rule: SectionRule,
    layout: GroupedLayout,
    context: SectionContext
  ): Chunk[] {
    const overview: string[] = [];
    const groups = new Map<string, string[]>();
    let currentGroup: string[] | null = null;

    for (const item of items) {
      const trimmed = item.trim();
      if (trimmed.endsWith(layout.marker) && layout.groupNames.some(name => trimmed.includes(name))) {
        currentGroup = [];
        groups.set(trimmed.replaceAll(layout.marker, '').trim(), currentGroup);
      } else if (currentGroup) {
        currentGroup.push(item);
      } else {
        overview.push(item);
      }
    }

    const chunks: Chunk[] = [];

    if (overview.length > 0) {
      const split = rule.split;
      if (split && countWordsInItems(overview) > split.whenWordsExceed) {
        chunks.push(...this.renderParts(overview, split.maxWords, layout.overviewLabel, context));
      } else {
        chunks.push(
          formatChunk({
            ...this.header(context),
            section: layout.overviewLabel,
            keyFacts: context.metadataFacts,
            mainContent: trimmedNonBlank(overview),
          })
        );
      }
    }

    for (const [name, groupItems] of groups) {
      if (groupItems.length === 0) continue;
      chunks.push(
        formatChunk({
          ...this.header(context),
          section: `${layout.groupLabelPrefix}${name}`,
          keyFacts: trimmedNonBlank(groupItems),
        })
      );
    }

    return chunks;
  }

  private metadataFacts(document: IntermediateDocument): string[] {
    return Object.entries(document.metadata)
      .filter(([key, value]) => key.length > 0 && value.length > 0)
      .map(([key, value]) => `${key}: ${value}`);
  }

  private provenance(document: IntermediateDocument, rule: SectionRule): string[] {
    const fields = this.policy.provenance.map(field =>
      field === 'bbg_version' && document.bbg_version ? `v${document.bbg_version}` : document[field]
    );
    return rule.sourceTag ? [...fields, rule.sourceTag] : fields;
  }
}
