/**
 * SQLite + FTS5 schema for the document index
 *
 * @module storage/schema
 */

/**
 * Stored documents. `(source, id)` is the identity; `doc_id` is the stable
 * rowid the full-text table points at.
 */
export const DOCUMENTS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  doc_id INTEGER PRIMARY KEY,
  source TEXT NOT NULL,
  id TEXT NOT NULL,
  title TEXT NOT NULL,
  link TEXT NOT NULL,
  content TEXT NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  indexed_at TEXT NOT NULL,
  UNIQUE (source, id)
);

CREATE INDEX IF NOT EXISTS idx_documents_source ON documents(source);
`;

/**
 * Full-text table over the default search fields, in external content mode.
 * Column order matters: 0 = title, 1 = content.
 */
export const DOCUMENTS_FTS_TABLE_SQL = `
CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
  title,
  content,
  content='documents',
  content_rowid='doc_id',
  tokenize='unicode61'
);
`;

/**
 * Keep documents_fts in step with documents
 */
export const DOCUMENTS_FTS_TRIGGERS_SQL = `
CREATE TRIGGER IF NOT EXISTS documents_ai AFTER INSERT ON documents BEGIN
  INSERT INTO documents_fts(rowid, title, content) VALUES (new.doc_id, new.title, new.content);
END;

CREATE TRIGGER IF NOT EXISTS documents_ad AFTER DELETE ON documents BEGIN
  INSERT INTO documents_fts(documents_fts, rowid, title, content) VALUES('delete', old.doc_id, old.title, old.content);
END;

CREATE TRIGGER IF NOT EXISTS documents_au AFTER UPDATE ON documents BEGIN
  INSERT INTO documents_fts(documents_fts, rowid, title, content) VALUES('delete', old.doc_id, old.title, old.content);
  INSERT INTO documents_fts(rowid, title, content) VALUES (new.doc_id, new.title, new.content);
END;
`;

/**
 * Insert a document, or replace the stored fields of an existing `(source, id)`
 */
export const UPSERT_DOCUMENT_SQL = `
INSERT INTO documents (source, id, title, link, content, metadata, indexed_at)
VALUES (@source, @id, @title, @link, @content, @metadata, @indexedAt)
ON CONFLICT (source, id) DO UPDATE SET
  title = excluded.title,
  link = excluded.link,
  content = excluded.content,
  metadata = excluded.metadata,
  indexed_at = excluded.indexed_at
`;

/**
 * Top-K query. Lower bm25() is a better match; the score is negated so higher is better.
 */
export const SEARCH_SQL = `
SELECT
  d.id AS id,
  d.source AS source,
  d.title AS title,
  d.link AS link,
  snippet(documents_fts, -1, '<mark>', '</mark>', '...', 24) AS snippet,
  -bm25(documents_fts) AS score
FROM documents_fts
JOIN documents d ON d.doc_id = documents_fts.rowid
WHERE documents_fts MATCH ?
ORDER BY bm25(documents_fts)
LIMIT ?
`;

export const DELETE_ALL_SQL = `DELETE FROM documents`;

export const DELETE_SOURCE_SQL = `DELETE FROM documents WHERE source = ?`;

export const FTS_OPTIMIZE_SQL = `INSERT INTO documents_fts(documents_fts) VALUES('optimize')`;

/**
 * Complete schema, safe to run on every open
 */
export function getSchemaSQL(): string {
  return [DOCUMENTS_TABLE_SQL, DOCUMENTS_FTS_TABLE_SQL, DOCUMENTS_FTS_TRIGGERS_SQL].join("\n");
}
