/**
 * Document model shared by sources, the index engine and the ingestion driver.
 *
 * @module documents/types
 */

/**
 * Unit of ingested content.
 *
 * `(source, id)` is the document's identity inside the index.
 */
export interface Document {
  /** Unique within its source */
  readonly id: string;

  /** Identifier of the configured source that produced it */
  readonly source: string;

  readonly title: string;

  /** Stable locator, e.g. a file path or URL */
  readonly link: string;

  readonly content: string;

  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * A scored search result.
 */
export interface FoundItem {
  readonly id: string;

  /** Higher is better */
  readonly score: number;

  readonly source: string;
  readonly title: string;
  readonly link: string;

  /** Excerpt of the matching content with `<mark>` highlights */
  readonly snippet: string;
}
