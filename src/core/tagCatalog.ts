/**
 * Tag Catalog
 *
 * Registry of the tags considered sensitive by the Basic Application Level
 * Confidentiality Profile (DICOM PS3.15 Annex E), grouped by category for
 * display. Loaded once from `../data/tagCatalog.json` and frozen.
 */

import { z } from 'zod';
import catalogData from '../data/tagCatalog.json';
import { isKnownVr, type Vr } from './vr';
import { isValidTag, normalizeTag } from '../utils/tagUtils';

export type TagCategory =
  | 'Patient Identity'
  | 'Physicians & Operators'
  | 'Institution & Equipment'
  | 'Study & Series'
  | 'Dates & Times'
  | 'Unique Identifiers';

export interface CatalogEntry {
  readonly tag: string;
  readonly keyword: string;
  readonly name: string;
  /** Expected VR, used when the file does not state one (implicit VR, UN) */
  readonly vr: Vr;
  readonly category: TagCategory;
}

export interface CatalogCategory {
  readonly category: TagCategory;
  readonly entries: readonly CatalogEntry[];
}

const categorySchema = z.enum([
  'Patient Identity',
  'Physicians & Operators',
  'Institution & Equipment',
  'Study & Series',
  'Dates & Times',
  'Unique Identifiers',
]);

const entrySchema = z.object({
  tag: z.string().refine(isValidTag, { message: 'malformed tag' }).transform(normalizeTag),
  keyword: z.string().min(1),
  name: z.string().min(1),
  vr: z.string().refine(isKnownVr, { message: 'unknown VR' }),
});

const catalogSchema = z.object({
  categories: z.array(
    z.object({
      category: categorySchema,
      entries: z.array(entrySchema).min(1),
    })
  ),
});

/**
 * Immutable tag catalog.
 */
export class TagCatalog {
  private readonly byTag: ReadonlyMap<string, CatalogEntry>;
  private readonly byKeyword: ReadonlyMap<string, CatalogEntry>;
  private readonly categories: readonly CatalogCategory[];

  constructor(categories: readonly CatalogCategory[]) {
    const byTag = new Map<string, CatalogEntry>();
    const byKeyword = new Map<string, CatalogEntry>();
    for (const group of categories) {
      for (const entry of group.entries) {
        if (byTag.has(entry.tag)) {
          throw new Error(`Duplicate catalog tag ${entry.tag}`);
        }
        byTag.set(entry.tag, entry);
        byKeyword.set(entry.keyword.toLowerCase(), entry);
      }
    }
    this.byTag = byTag;
    this.byKeyword = byKeyword;
    this.categories = Object.freeze(
      categories.map((group) => Object.freeze({ category: group.category, entries: Object.freeze([...group.entries]) }))
    );
  }

  /**
   * Parse and validate raw catalog data (the JSON file's shape).
   */
  static fromData(data: unknown): TagCatalog {
    const parsed = catalogSchema.parse(data);
    return new TagCatalog(
      parsed.categories.map((group) => ({
        category: group.category,
        entries: group.entries.map((entry) =>
          Object.freeze({
            tag: entry.tag,
            keyword: entry.keyword,
            name: entry.name,
            vr: toVr(entry.vr),
            category: group.category,
          })
        ),
      }))
    );
  }

  /** Entry for a tag in any supported format */
  lookup(tag: string): CatalogEntry | undefined {
    return this.byTag.get(normalizeTag(tag));
  }

  /** Entry for a DICOM keyword such as `PatientName` (case-insensitive) */
  lookupKeyword(keyword: string): CatalogEntry | undefined {
    return this.byKeyword.get(keyword.trim().toLowerCase());
  }

  has(tag: string): boolean {
    return this.lookup(tag) !== undefined;
  }

  /** Categories in display order */
  allCategories(): readonly CatalogCategory[] {
    return this.categories;
  }

  entries(): CatalogEntry[] {
    return this.categories.flatMap((group) => group.entries);
  }

  get size(): number {
    return this.byTag.size;
  }
}

function toVr(code: string): Vr {
  if (!isKnownVr(code)) {
    throw new Error(`Unknown VR ${code}`);
  }
  return code;
}

/**
 * Process-wide catalog of Annex E tags.
 */
export const DEFAULT_CATALOG: TagCatalog = TagCatalog.fromData(catalogData);
