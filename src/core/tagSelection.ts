/**
 * Tag Selection
 *
 * The set of catalog tags chosen for anonymization in one batch run.
 */

import { ConfigurationError } from './errors';
import { DEFAULT_CATALOG, type CatalogEntry, type TagCatalog } from './tagCatalog';
import { formatTagWithComma, isValidTag, normalizeTag } from '../utils/tagUtils';

export class TagSelection {
  private readonly tags: ReadonlySet<string>;

  private constructor(tags: Iterable<string>) {
    this.tags = new Set(tags);
  }

  /**
   * Every catalog tag selected (the default).
   */
  static all(catalog: TagCatalog = DEFAULT_CATALOG): TagSelection {
    return new TagSelection(catalog.entries().map((entry) => entry.tag));
  }

  /**
   * Select the given tags. Identifiers may be tags in any supported format
   * or catalog keywords; anything not in the catalog is rejected.
   */
  static of(identifiers: Iterable<string>, catalog: TagCatalog = DEFAULT_CATALOG): TagSelection {
    const tags: string[] = [];
    for (const identifier of identifiers) {
      tags.push(resolveIdentifier(identifier, catalog).tag);
    }
    return new TagSelection(tags);
  }

  has(tag: string): boolean {
    return this.tags.has(normalizeTag(tag));
  }

  /**
   * A new selection without the given identifiers.
   */
  without(identifiers: Iterable<string>, catalog: TagCatalog = DEFAULT_CATALOG): TagSelection {
    const excluded = new Set<string>();
    for (const identifier of identifiers) {
      excluded.add(resolveIdentifier(identifier, catalog).tag);
    }
    return new TagSelection([...this.tags].filter((tag) => !excluded.has(tag)));
  }

  get size(): number {
    return this.tags.size;
  }

  get isEmpty(): boolean {
    return this.tags.size === 0;
  }

  toArray(): string[] {
    return [...this.tags].sort();
  }
}

function resolveIdentifier(identifier: string, catalog: TagCatalog): CatalogEntry {
  const entry = isValidTag(identifier) ? catalog.lookup(identifier) : catalog.lookupKeyword(identifier);
  if (!entry) {
    const shown = isValidTag(identifier) ? `(${formatTagWithComma(identifier)})` : `"${identifier}"`;
    throw new ConfigurationError(`Tag ${shown} is not in the anonymization catalog`);
  }
  return entry;
}
