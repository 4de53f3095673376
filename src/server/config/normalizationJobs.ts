/**
 * Normalization Job Table
 *
 * Which raw file feeds which category normalizer, and where its chunks are written.
 * Input paths are relative to RAW_DATA_DIR, output paths to PROCESSED_DATA_DIR.
 */

/**
 * Fields of the single-section document a plain-text source is wrapped into
 */
export interface TextDocumentFields {
  title: string;
  source: string;
  category: string;
}

export type JobInput =
  | {
      format: 'json';
      path: string;
      /** Category key inside a mapping payload; omitted = every category */
      key?: string;
    }
  | {
      format: 'text';
      path: string;
      document: TextDocumentFields;
    };

export interface NormalizationJob {
  name: string;
  /** Registry key of the normalizer (see UnifiedNormalizationService) */
  category: string;
  input: JobInput;
  output: string;
}

const OFFICIAL_WIKI_FILE = 'civ6_wiki/civ6_complete_data.json';
const MOD_WIKI_FILE = 'bbg_wiki/bbg_complete_data.json';

function officialWikiJob(category: string): NormalizationJob {
  return {
    name: `official_wiki/${category}`,
    category,
    input: { format: 'json', path: OFFICIAL_WIKI_FILE, key: category },
    output: `official_wiki/${category}.json`,
  };
}

function modWikiJob(category: string, key: string, output: string): NormalizationJob {
  return {
    name: `bbg/${category}`,
    category,
    input: { format: 'json', path: MOD_WIKI_FILE, key },
    output: `bbg/${output}.json`,
  };
}

export const DEFAULT_NORMALIZATION_JOBS: readonly NormalizationJob[] = [
  officialWikiJob('civilizations'),
  officialWikiJob('leaders'),
  officialWikiJob('districts'),
  officialWikiJob('buildings'),
  officialWikiJob('wonders'),
  officialWikiJob('game_concepts'),
  modWikiJob('city_states', 'city_state', 'city_states'),
  modWikiJob('world_congress', 'world_congress', 'congress'),
  modWikiJob('miscellaneous', 'miscellaneous', 'misc'),
  modWikiJob('natural_wonders', 'natural_wonder', 'natural_wonder'),
  modWikiJob('religions', 'religion', 'religion'),
  {
    name: 'bbm/documentation',
    category: 'documentation',
    input: {
      format: 'text',
      path: 'bbm/BBM v1.1.txt',
      document: { title: 'BBM - Better Balanced Maps v1.1', source: 'bbm_docs', category: 'game_mods' },
    },
    output: 'bbm/documentation.json',
  },
  {
    name: 'youtube/transcripts',
    category: 'video_transcripts',
    input: { format: 'json', path: 'youtube/youtube_transcripts.json', key: 'youtube_strategy' },
    output: 'youtube/transcripts.json',
  },
];
