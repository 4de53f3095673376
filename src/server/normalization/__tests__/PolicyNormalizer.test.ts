import { describe, it, expect } from 'vitest';
import { buildingsPolicy } from '../policies/buildingsPolicy.js';
import { civilizationsPolicy } from '../policies/civilizationsPolicy.js';
import { districtsPolicy } from '../policies/districtsPolicy.js';
import { gameConceptsPolicy } from '../policies/gameConceptsPolicy.js';
import { leadersPolicy } from '../policies/leadersPolicy.js';
import { cityStatesPolicy } from '../policies/modWikiPolicies.js';
import { wondersPolicy } from '../policies/wondersPolicy.js';
import { extractEntityName, PolicyNormalizer, selectRule } from '../strategies/PolicyNormalizer.js';
import {
  EDITION_TAG_PATTERN,
  INTRODUCTION_HEADING,
  WIKI_PROVENANCE,
  exact,
  fixedLabel,
  type NormalizationPolicy,
} from '../policies/NormalizationPolicy.js';
import { LONG_PARAGRAPH, makeDocument, words } from './testDocuments.js';

const wiki = { source: 'civ6_wiki' };

describe('extractEntityName', () => {
  it('strips the edition tag', () => {
    expect(extractEntityName('Abraham Lincoln (Civ6)', EDITION_TAG_PATTERN)).toBe('Abraham Lincoln');
  });

  it('falls back to the title', () => {
    expect(extractEntityName('Rome', EDITION_TAG_PATTERN)).toBe('Rome');
    expect(extractEntityName('Rome (Civ6)')).toBe('Rome (Civ6)');
  });
});

describe('selectRule', () => {
  it('matches keywords case-insensitively and literals exactly', () => {
    expect(selectRule(civilizationsPolicy.rules, 'Victory types[]').name).toBe('gameplay-advice');
    expect(selectRule(civilizationsPolicy.rules, 'Film Studio[]').name).toBe('unique-component');
    expect(selectRule(civilizationsPolicy.rules, 'Film Studio').name).toBe('other');
  });
});

describe('PolicyNormalizer', () => {
  describe('civilizations', () => {
    const normalizer = new PolicyNormalizer(civilizationsPolicy);

    it('puts page metadata ahead of the short facts of the introduction', () => {
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Rome (Civ6)',
          category: 'civilizations',
          metadata: { Leader: 'Trajan', Capital: 'Rome', Empty: '' },
          sections: [{ heading: 'Introduction', content: ['Rome is a civilization.', LONG_PARAGRAPH] }],
        })
      );

      expect(chunks).toEqual([
        [
          'Title: Rome',
          'Section: Overview',
          'Key Facts:',
          '- Leader: Trajan',
          '- Capital: Rome',
          '- Rome is a civilization.',
          'Main Content:',
          LONG_PARAGRAPH,
          'Source: civ6_wiki, civilizations',
        ].join('\n'),
      ]);
    });

    it('splits long leader-ability sections into numbered parts', () => {
      const items = ['a', 'b', 'c', 'd'].map((prefix) => words(100, prefix));
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'America (Civ6)',
          category: 'civilizations',
          sections: [{ heading: 'Roosevelt Corollary[]', content: items }],
        })
      );

      expect(chunks).toEqual([
        `Title: America\nSection: Roosevelt Corollary (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, civilizations, leader_ability`,
        `Title: America\nSection: Roosevelt Corollary (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki, civilizations, leader_ability`,
      ]);
    });

    it('drops the part number when a long section yields a single part', () => {
      const item = words(301, 'w');
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'America (Civ6)',
          category: 'civilizations',
          sections: [{ heading: 'Roosevelt Corollary[]', content: [item] }],
        })
      );

      expect(chunks).toEqual([
        `Title: America\nSection: Roosevelt Corollary\nMain Content:\n${item}\nSource: civ6_wiki, civilizations, leader_ability`,
      ]);
    });

    it('classifies unique components at the lower threshold', () => {
      const medium = 'm'.repeat(170);
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'America (Civ6)',
          category: 'civilizations',
          sections: [{ heading: 'Rough Rider[]', content: [medium] }],
        })
      );

      expect(chunk).toBe(
        `Title: America\nSection: Unique Component - Rough Rider\nMain Content:\n${medium}\nSource: civ6_wiki, civilizations, unique_component`
      );
    });

    it('skips the category index page', () => {
      const chunks = normalizer.normalize(
        makeDocument({
          title: 'Civilizations (Civ6)',
          sections: [{ heading: 'Introduction', content: ['All civilizations.'] }],
        })
      );

      expect(chunks).toEqual([]);
    });

    it('emits nothing for a section without content', () => {
      const chunks = normalizer.normalize(
        makeDocument({ title: 'Rome (Civ6)', sections: [{ heading: 'Introduction', content: [] }] })
      );

      expect(chunks).toEqual([]);
    });

    it('is idempotent', () => {
      const document = makeDocument({
        ...wiki,
        title: 'Rome (Civ6)',
        category: 'civilizations',
        metadata: { Leader: 'Trajan' },
        sections: [
          { heading: 'Introduction', content: ['Rome is a civilization.'] },
          { heading: 'Strategy[]', content: [LONG_PARAGRAPH] },
        ],
      });

      expect(normalizer.normalize(document)).toEqual(normalizer.normalize(document));
    });
  });

  describe('leaders', () => {
    const normalizer = new PolicyNormalizer(leadersPolicy);
    const base = { ...wiki, title: 'Trajan (Civ6)', category: 'leaders' };

    it('keeps the long first introduction item as a fact', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...base,
          sections: [{ heading: 'Introduction', content: [LONG_PARAGRAPH, 'Short fact.'] }],
        })
      );

      expect(chunk).toBe(
        `Title: Trajan\nSection: Overview\nKey Facts:\n- ${LONG_PARAGRAPH}\n- Short fact.\nSource: civ6_wiki, leaders`
      );
    });

    it('lists dialogue lines as facts, dropping blank ones', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...base,
          sections: [{ heading: 'Voiced[]', content: [' Agreement: Hello. ', '  '] }],
        })
      );

      expect(chunk).toBe(
        'Title: Trajan\nSection: Dialogue - Voiced\nKey Facts:\n- Agreement: Hello.\nSource: civ6_wiki, leaders, dialogue'
      );
    });

    it('labels the civilopedia entry as historical background', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({ ...base, sections: [{ heading: 'Civilopedia entry[]', content: ['Born in Italica.'] }] })
      );

      expect(chunk).toBe(
        'Title: Trajan\nSection: Historical Background\nMain Content:\nBorn in Italica.\nSource: civ6_wiki, leaders, history'
      );
    });

    it('keeps a civilopedia entry of up to 400 words whole', () => {
      const items = ['a', 'b', 'c', 'd'].map((prefix) => words(95, prefix));
      const chunks = normalizer.normalize(
        makeDocument({ ...base, sections: [{ heading: 'Civilopedia entry[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Trajan\nSection: Historical Background\nMain Content:\n${items.join('\n')}\nSource: civ6_wiki, leaders, history`,
      ]);
    });

    it('splits a longer civilopedia entry into parts of at most 350 words', () => {
      const items = ['a', 'b', 'c', 'd', 'e'].map((prefix) => words(100, prefix));
      const chunks = normalizer.normalize(
        makeDocument({ ...base, sections: [{ heading: 'Civilopedia entry[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Trajan\nSection: Historical Background (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, leaders, history`,
        `Title: Trajan\nSection: Historical Background (Part 2/2)\nMain Content:\n${items.slice(3).join(' ')}\nSource: civ6_wiki, leaders, history`,
      ]);
    });
  });

  describe('districts', () => {
    const normalizer = new PolicyNormalizer(districtsPolicy);

    it('uses the system title on general mechanics pages', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'District (Civ6)',
          category: 'districts',
          sections: [{ heading: 'Basic requirements[]', content: ['Needs population.'] }],
        })
      );

      expect(chunk).toBe(
        'Title: District System\nSection: Basic requirements\nKey Facts:\n- Needs population.\nSource: civ6_wiki, districts, game_mechanics'
      );
    });

    it('lists buildings of a district page as facts', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Campus (Civ6)',
          category: 'districts',
          sections: [{ heading: 'Buildings[]', content: ['Library', 'University'] }],
        })
      );

      expect(chunk).toBe('Title: Campus\nSection: Buildings\nKey Facts:\n- Library\n- University\nSource: civ6_wiki, districts');
    });

    it('keeps the system title and mechanics tag on every part of a long mechanics section', () => {
      const items = ['a', 'b', 'c', 'd'].map((prefix) => words(100, prefix));
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'District (Civ6)',
          category: 'districts',
          sections: [{ heading: 'Introduction', content: items }],
        })
      );

      expect(chunks).toEqual([
        `Title: District System\nSection: Introduction (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, districts, game_mechanics`,
        `Title: District System\nSection: Introduction (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki, districts, game_mechanics`,
      ]);
    });

    it('does not split a mechanics section of 300 words', () => {
      const items = ['a', 'b', 'c'].map((prefix) => words(100, prefix));
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'District (Civ6)',
          category: 'districts',
          sections: [{ heading: 'Introduction', content: items }],
        })
      );

      expect(chunks).toEqual([
        `Title: District System\nSection: Introduction\nMain Content:\n${items.join('\n')}\nSource: civ6_wiki, districts, game_mechanics`,
      ]);
    });
  });

  describe('buildings', () => {
    const normalizer = new PolicyNormalizer(buildingsPolicy);

    it('groups regional effects by district under the system title', () => {
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Factory (Civ6)',
          category: 'buildings',
          sections: [
            {
              heading: 'Buildings with regional effects[]',
              content: [
                'Some buildings affect nearby cities.',
                'Industrial Zone[]',
                'Factory: +3 Production.',
                'Power Plant: +4 Production.',
                'Holy Site[]',
                'Water Park[]',
                'Ferris Wheel: +1 Amenity.',
              ],
            },
          ],
        })
      );

      expect(chunks).toEqual([
        'Title: Building System\nSection: Regional Effects Overview\nMain Content:\nSome buildings affect nearby cities.\nSource: civ6_wiki, buildings, regional_effects',
        'Title: Building System\nSection: Regional Effects - Industrial Zone\nKey Facts:\n- Factory: +3 Production.\n- Power Plant: +4 Production.\nSource: civ6_wiki, buildings, regional_effects',
        'Title: Building System\nSection: Regional Effects - Water Park\nKey Facts:\n- Ferris Wheel: +1 Amenity.\nSource: civ6_wiki, buildings, regional_effects',
      ]);
    });

    it('adds metadata to the introduction of a building page', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Library (Civ6)',
          category: 'buildings',
          metadata: { Cost: '90' },
          sections: [{ heading: 'Introduction', content: ['Provides science.'] }],
        })
      );

      expect(chunk).toBe(
        'Title: Library\nSection: Introduction\nKey Facts:\n- Cost: 90\n- Provides science.\nSource: civ6_wiki, buildings'
      );
    });
  });

  describe('wonders', () => {
    const normalizer = new PolicyNormalizer(wondersPolicy);
    const pyramids = { ...wiki, title: 'Pyramids (Civ6)', category: 'wonders' };

    it('keeps a civilopedia entry of 350 words whole', () => {
      const items = [words(200, 'a'), words(150, 'b')];
      const chunks = normalizer.normalize(
        makeDocument({ ...pyramids, sections: [{ heading: 'Civilopedia entry[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Pyramids\nSection: Historical Background\nMain Content:\n${items.join('\n')}\nSource: civ6_wiki, wonders, history`,
      ]);
    });

    it('splits a civilopedia entry over 350 words', () => {
      const items = [words(200, 'a'), words(151, 'b')];
      const chunks = normalizer.normalize(
        makeDocument({ ...pyramids, sections: [{ heading: 'Civilopedia entry[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Pyramids\nSection: Historical Background (Part 1/2)\nMain Content:\n${items[0]}\nSource: civ6_wiki, wonders, history`,
        `Title: Pyramids\nSection: Historical Background (Part 2/2)\nMain Content:\n${items[1]}\nSource: civ6_wiki, wonders, history`,
      ]);
    });

    it('keeps the system title and mechanics tag on every part of a long mechanics section', () => {
      const items = ['a', 'b', 'c', 'd'].map((prefix) => words(100, prefix));
      const chunks = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Wonder (Civ6)',
          category: 'wonders',
          sections: [{ heading: 'Building a wonder[]', content: items }],
        })
      );

      expect(chunks).toEqual([
        `Title: Wonder System\nSection: Building a wonder (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, wonders, game_mechanics`,
        `Title: Wonder System\nSection: Building a wonder (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki, wonders, game_mechanics`,
      ]);
    });

    it('picks the natural wonder system title by keyword', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Natural wonder (Civ6)',
          category: 'wonders',
          sections: [{ heading: 'Finding natural wonders[]', content: ['Explore the map.'] }],
        })
      );

      expect(chunk).toBe(
        'Title: Natural Wonder System\nSection: Finding natural wonders\nKey Facts:\n- Explore the map.\nSource: civ6_wiki, wonders, game_mechanics'
      );
    });
  });

  describe('game concepts', () => {
    const normalizer = new PolicyNormalizer(gameConceptsPolicy);
    const loyalty = { ...wiki, title: 'Loyalty (Civ6)', category: 'game_concepts' };
    const items = ['a', 'b', 'c', 'd'].map((prefix) => words(100, prefix));

    it('splits a long core mechanic section', () => {
      const chunks = normalizer.normalize(
        makeDocument({ ...loyalty, sections: [{ heading: 'How it works[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Loyalty\nSection: How it works (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, game_concepts, game_mechanics`,
        `Title: Loyalty\nSection: How it works (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki, game_concepts, game_mechanics`,
      ]);
    });

    it('splits a long sub-mechanic section', () => {
      const chunks = normalizer.normalize(
        makeDocument({ ...loyalty, sections: [{ heading: 'Effects[]', content: items }] })
      );

      expect(chunks).toEqual([
        `Title: Loyalty\nSection: Effects (Part 1/2)\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki, game_concepts, game_mechanics`,
        `Title: Loyalty\nSection: Effects (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki, game_concepts, game_mechanics`,
      ]);
    });

    it('keeps a sub-mechanic section of 300 words whole', () => {
      const chunks = normalizer.normalize(
        makeDocument({ ...loyalty, sections: [{ heading: 'Effects[]', content: items.slice(0, 3) }] })
      );

      expect(chunks).toEqual([
        `Title: Loyalty\nSection: Effects\nMain Content:\n${items.slice(0, 3).join('\n')}\nSource: civ6_wiki, game_concepts, game_mechanics`,
      ]);
    });

    it('tags every section as game mechanics', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          ...wiki,
          title: 'Loyalty (Civ6)',
          category: 'game_concepts',
          sections: [{ heading: 'Effects[]', content: ['Cities can flip.'] }],
        })
      );

      expect(chunk).toBe(
        'Title: Loyalty\nSection: Effects\nKey Facts:\n- Cities can flip.\nSource: civ6_wiki, game_concepts, game_mechanics'
      );
    });
  });

  describe('mod wiki', () => {
    const normalizer = new PolicyNormalizer(cityStatesPolicy);

    it('adds page name and version to the Source line', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          title: 'City-States',
          source: 'bbg_wiki',
          category: 'city_states',
          page_name: 'City-States',
          bbg_version: '6.5',
          sections: [{ heading: 'Auckland', content: ['Gain production on shallow water tiles.'] }],
        })
      );

      expect(chunk).toBe(
        'Title: City-States\nSection: Auckland\nKey Facts:\n- Gain production on shallow water tiles.\nSource: bbg_wiki, city_states, City-States, v6.5'
      );
    });

    it('leaves out missing provenance fields', () => {
      const [chunk] = normalizer.normalize(
        makeDocument({
          title: 'City-States',
          source: 'bbg_wiki',
          sections: [{ heading: 'Auckland', content: ['Gain production.'] }],
        })
      );

      expect(chunk).toBe('Title: City-States\nSection: Auckland\nKey Facts:\n- Gain production.\nSource: bbg_wiki');
    });
  });

  describe('split introductions', () => {
    const splitIntroductionPolicy: NormalizationPolicy = {
      name: 'split_introductions',
      titleStrategy: 'document',
      provenance: WIKI_PROVENANCE,
      rules: [
        {
          name: 'overview',
          match: [exact(INTRODUCTION_HEADING)],
          label: fixedLabel('Overview'),
          layout: { type: 'main' },
          split: { whenWordsExceed: 300, maxWords: 300 },
          includeMetadata: true,
        },
      ],
    };

    it('puts page metadata on the first part only', () => {
      const items = ['a', 'b', 'c', 'd'].map((prefix) => words(100, prefix));
      const chunks = new PolicyNormalizer(splitIntroductionPolicy).normalize(
        makeDocument({
          ...wiki,
          title: 'Rome',
          metadata: { Leader: 'Trajan' },
          sections: [{ heading: 'Introduction', content: items }],
        })
      );

      expect(chunks).toEqual([
        `Title: Rome\nSection: Overview (Part 1/2)\nKey Facts:\n- Leader: Trajan\nMain Content:\n${items.slice(0, 3).join(' ')}\nSource: civ6_wiki`,
        `Title: Rome\nSection: Overview (Part 2/2)\nMain Content:\n${items[3]}\nSource: civ6_wiki`,
      ]);
    });
  });
});
