/**
 * Contract Types
 *
 * Types shared by the scrapers (producers of intermediate documents), the
 * normalizers and the downstream retrieval store (consumer of chunk records).
 * Field names of IntermediateDocument and Section match the raw JSON files exactly.
 */

/**
 * Key-value facts scraped from a page (infobox stats, video channel, ...).
 * Insertion order is the display order.
 */
export type DocumentMetadata = Record<string, string>;

/**
 * A titled block of raw content within one source document
 */
export interface Section {
  heading: string; // may carry the trailing "[]" edit-link marker
  content: string[]; // paragraphs or list entries, in page order
}

/**
 * Semi-structured page or video as emitted by a scraper, after validation: fields the
 * scraper left out are empty strings, an empty metadata map or an empty section list
 */
export interface IntermediateDocument {
  title: string;
  source: string; // provenance tag, e.g. "civ6_wiki", "bbg_wiki", "youtube"
  category: string;
  url: string;
  metadata: DocumentMetadata;
  sections: Section[];
  page_name: string; // mod-wiki page the document was scraped from
  bbg_version: string; // mod version the page describes
}

/**
 * A raw file holds one document, a list of them, or a mapping category -> list
 */
export type SourcePayload = Record<string, IntermediateDocument[]>;

/**
 * Node produced by the hierarchical section parser for flat documentation text
 */
export interface ParsedHeadingNode {
  title: string;
  level: number; // 1 = top-level, 2 = subsection
  content: string; // body lines joined with "\n"
  parent?: string; // title of the enclosing level-1 heading
}

/**
 * A single formatted chunk string (Title / Section / Key Facts / Main Content / Source)
 */
export type Chunk = string;

/**
 * Persisted form of a chunk. All provenance lives inside `text`.
 */
export interface ChunkRecord {
  text: Chunk;
}
