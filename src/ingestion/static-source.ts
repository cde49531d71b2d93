/**
 * Fixed list document source.
 *
 * @module ingestion/static-source
 */

import type { Document } from "../documents/types.js";
import { channelStream, type ChannelStream } from "../streams/channel-stream.js";
import type { DocumentSource } from "./types.js";
import { ValidationError } from "./errors.js";

/**
 * Replays a fixed list of documents once per fetch, in order.
 */
export class StaticSource implements DocumentSource {
  readonly id: string;
  private readonly documents: readonly Document[];

  /**
   * @throws {ValidationError} If the id is empty, a document has an empty id,
   * or a document names another source
   */
  constructor(sourceId: string, documents: readonly Document[]) {
    if (!sourceId || sourceId.trim() === "") {
      throw new ValidationError("Source id cannot be empty", "sourceId");
    }
    for (const doc of documents) {
      if (!doc.id) {
        throw new ValidationError(`Source '${sourceId}' contains a document with an empty id`, "documents");
      }
      if (doc.source !== sourceId) {
        throw new ValidationError(
          `Document '${doc.id}' belongs to source '${doc.source}', not '${sourceId}'`,
          "documents"
        );
      }
    }
    this.id = sourceId;
    this.documents = [...documents];
  }

  fetch(): ChannelStream<Document> {
    return channelStream<Document>(
      async (tx) => {
        for (const doc of this.documents) {
          await tx.send(doc);
        }
      },
      { name: `static:${this.id}` }
    );
  }
}
